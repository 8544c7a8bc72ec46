/**
 * `suggest` command: propose exception declarations for endpoints with issues
 */

import { Command, Option } from 'commander';
import { analyze } from '../analyzer.js';
import { formatSuggestions, type SuggestionFormat } from '../reporters/index.js';
import {
  parseDepth,
  prepareRun,
  resolveAnalysisOptions,
  type AnalysisCliOptions,
} from './options.js';

interface SuggestCliOptions extends AnalysisCliOptions {
  format: SuggestionFormat;
}

const SUGGESTION_FORMATS: readonly SuggestionFormat[] = ['text', 'diff'];

export function createSuggestCommand(): Command {
  const suggest = new Command('suggest');

  suggest
    .description('Generate exception declarations for endpoints')
    .argument('<path>', 'File or directory to analyze')
    .option('--depth <n>', 'Maximum call depth for transitive analysis (default: 3)', parseDepth)
    .option('--config <path>', 'Path to configuration file')
    .addOption(new Option('--format <format>', 'Output format').choices(SUGGESTION_FORMATS).default('text'))
    .action((targetPath: string, options: SuggestCliOptions) => {
      const config = prepareRun(targetPath, options);
      const result = analyze(targetPath, resolveAnalysisOptions(options, config));

      for (const line of formatSuggestions(result, options.format)) {
        console.log(line);
      }
    });

  return suggest;
}
