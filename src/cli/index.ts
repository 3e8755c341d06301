#!/usr/bin/env node
/**
 * Groundwork CLI
 *
 * Command-line interface for the grounded problem-solving agent.
 */

import { Command } from 'commander';
import { solveCommand } from './commands/solve.js';
import { inspectCommand } from './commands/inspect.js';

const program = new Command();

program
  .name('groundwork')
  .description('Groundwork - problem-solving agent that only states what it has observed')
  .version('0.1.0');

program.addCommand(solveCommand);
program.addCommand(inspectCommand);

program.parse();
