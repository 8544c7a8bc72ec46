/**
 * Shared helpers for writing throwaway TypeScript projects
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as ts from 'typescript';

/**
 * Writes the given files into a fresh temporary directory
 *
 * @returns Absolute path of the directory
 */
export function createProject(files: Record<string, string | Buffer>): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'route-throws-'));
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, relative);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content);
  }
  return root;
}

export function removeProject(root: string): void {
  fs.rmSync(root, { recursive: true, force: true });
}

/**
 * Parses source text in memory
 */
export function parseSnippet(code: string, fileName: string = 'snippet.ts'): ts.SourceFile {
  return ts.createSourceFile(fileName, code, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);
}

/**
 * Joins lines with newlines so line numbers in tests match array positions + 1
 */
export function lines(...content: string[]): string {
  return content.join('\n') + '\n';
}
