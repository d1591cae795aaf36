#!/usr/bin/env node

/**
 * vcluster CLI entry point.
 */

/* eslint-disable no-console */
import { createCliApp } from './app.js';
import { handleGenerateCommand } from './commands/generate.js';
import { handleVersionCommand } from './commands/version.js';
import { MAIN_HELP, getCommandHelp } from './help.js';
import { withErrorHandling } from './utils/errorHandling.js';

/**
 * Shows error message with help.
 *
 * @param message - The error message to display.
 */
function showError(message: string): void {
  console.error(`Error: ${message}`);
  console.error('\nRun "vcluster help" for usage information.');
}

/**
 * Shows help for a specific command.
 *
 * @param commandName - The command name to show help for.
 */
function showHelpForCommand(commandName: string): void {
  const help = getCommandHelp(commandName);
  if (help !== undefined) {
    console.log(help);
  } else {
    console.error(`Unknown command: ${commandName}`);
    console.error('\nRun "vcluster help" to see all available commands.');
    process.exitCode = 1;
  }
}

/**
 * Main CLI entry point.
 */
function main(): void {
  const args = process.argv.slice(2);
  const command = args[0];
  const commandArgs = args.slice(1);

  if (command === undefined) {
    console.log(MAIN_HELP);
    return;
  }

  switch (command) {
    case 'help':
    case '--help':
    case '-h':
      if (commandArgs[0] !== undefined) {
        showHelpForCommand(commandArgs[0]);
      } else {
        console.log(MAIN_HELP);
      }
      break;

    case 'version':
    case '--version':
    case '-v':
      withErrorHandling(() => handleVersionCommand());
      break;

    case 'generate':
      withErrorHandling(() => handleGenerateCommand(createCliApp({ args: commandArgs })));
      break;

    default:
      showError(`Unknown command: ${command}`);
      process.exitCode = 1;
  }
}

try {
  main();
} catch (error) {
  console.error('Unexpected error:', error instanceof Error ? error.message : String(error));
  if (error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exit(1);
}
