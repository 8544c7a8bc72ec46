/**
 * `list` command: show every endpoint with its declared and detected exceptions
 */

import { Command } from 'commander';
import { analyze } from '../analyzer.js';
import { formatEndpointListing } from '../reporters/index.js';
import {
  parseDepth,
  prepareRun,
  printFileErrors,
  resolveAnalysisOptions,
  type AnalysisCliOptions,
} from './options.js';

interface ListCliOptions extends AnalysisCliOptions {
  verbose?: boolean;
}

export function createListCommand(): Command {
  const list = new Command('list');

  list
    .description('List all detected exceptions in endpoints')
    .argument('<path>', 'File or directory to analyze')
    .option('--depth <n>', 'Maximum call depth for transitive analysis (default: 3)', parseDepth)
    .option('--config <path>', 'Path to configuration file')
    .option('-v, --verbose', 'Also show files that could not be parsed')
    .action((targetPath: string, options: ListCliOptions) => {
      const config = prepareRun(targetPath, options);
      const result = analyze(targetPath, resolveAnalysisOptions(options, config));

      if (options.verbose) {
        printFileErrors(result.errors);
      }

      for (const line of formatEndpointListing(result)) {
        console.log(line);
      }
    });

  return list;
}
