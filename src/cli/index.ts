/**
 * CLI Main Program
 *
 * Commander.js program setup for the dedupe-scanner CLI.
 */

import { Command, Option } from 'commander';

import { addScanCommand } from './commands/scan.js';
import { addLoadCommand } from './commands/load.js';
import { addFingerprintCommand } from './commands/fingerprint.js';
import { addEnvCommand } from './commands/env.js';

const VERSION = '0.1.0';

/**
 * Create the Commander.js program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('dedupe-scanner')
    .description('Find and eliminate duplicate documents by content fingerprint')
    .version(VERSION)
    .addOption(
      new Option('--format <format>', 'Output format').choices(['json', 'table']).default('json')
    );

  registerCommands(program);

  return program;
}

/**
 * Register all subcommands
 */
function registerCommands(program: Command): void {
  // Scanning
  addScanCommand(program);
  addFingerprintCommand(program);

  // Data
  addLoadCommand(program);

  // Configuration
  addEnvCommand(program);
}

/**
 * Run the CLI program
 */
export async function runCli(argv: string[]): Promise<void> {
  const program = createProgram();
  await program.parseAsync(argv, { from: 'user' });
}
