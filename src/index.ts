#!/usr/bin/env node

/**
 * CLI Entry Point - route exception declaration checker
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createCheckCommand } from './cli/check.js';
import { createListCommand } from './cli/list.js';
import { createSuggestCommand } from './cli/suggest.js';

const TOOL_NAME = 'route-throws';
const TOOL_VERSION = '0.1.0'; // Should match package.json

const program = new Command();

program
  .name(TOOL_NAME)
  .description('Validate exception declarations on route endpoints')
  .version(TOOL_VERSION);

program.addCommand(createCheckCommand());
program.addCommand(createListCommand());
program.addCommand(createSuggestCommand());

/**
 * Handle errors
 */
process.on('uncaughtException', (error) => {
  console.error(chalk.red('\nUnexpected error:'));
  console.error(error);
  process.exit(1);
});

program.parse(process.argv);
