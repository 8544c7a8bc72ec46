/**
 * `check` command: report undeclared exceptions and fail when there are any
 */

import { Command, Option } from 'commander';
import { analyze } from '../analyzer.js';
import { hasIssues } from '../results.js';
import { getFormatter, OUTPUT_FORMATS, printTerminalReport } from '../reporters/index.js';
import type { OutputFormat } from '../types.js';
import {
  collect,
  EXIT_ISSUES,
  parseDepth,
  prepareRun,
  printFileErrors,
  resolveAnalysisOptions,
  resolveFormat,
  type AnalysisCliOptions,
} from './options.js';

interface CheckCliOptions extends AnalysisCliOptions {
  format?: OutputFormat;
  verbose?: boolean;
  quiet?: boolean;
}

export function createCheckCommand(): Command {
  const check = new Command('check');

  check
    .description('Check for undeclared exceptions in route endpoints')
    .argument('<path>', 'File or directory to analyze')
    .option('--depth <n>', 'Maximum call depth for transitive analysis (default: 3)', parseDepth)
    .option('--ignore <name>', 'Exception class to ignore (repeatable)', collect)
    .addOption(new Option('--format <format>', 'Output format (default: text)').choices(OUTPUT_FORMATS))
    .option('--config <path>', 'Path to configuration file')
    .option('-v, --verbose', 'Show detailed analysis')
    .option('-q, --quiet', 'Print nothing; report through the exit code only')
    .action((targetPath: string, options: CheckCliOptions) => {
      const config = prepareRun(targetPath, options);
      const { maxDepth, ignoreExceptions } = resolveAnalysisOptions(options, config);
      const format = resolveFormat(options.format, config);

      const result = analyze(targetPath, { maxDepth, ignoreExceptions });

      if (!options.quiet) {
        printFileErrors(result.errors);

        if (format === 'text' && process.stdout.isTTY) {
          printTerminalReport(result, { verbose: options.verbose });
        } else {
          const output = getFormatter(format)(result, options.verbose);
          if (output) {
            console.log(output);
          }
        }
      }

      process.exit(hasIssues(result) ? EXIT_ISSUES : 0);
    });

  return check;
}
