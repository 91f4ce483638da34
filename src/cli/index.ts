#!/usr/bin/env node
/**
 * Flightmill diagnostics command-line interface.
 *
 * Usage: flightmill <command> [options]
 */

import type { Command } from './types.js';
import { diagnoseCommand } from './commands/diagnose.js';
import { historyCommand } from './commands/history.js';
import { configCommand } from './commands/config.js';
import { DiagnosticsError } from '../utils/errors.js';

const VERSION = '0.1.0';

const commands: Command[] = [diagnoseCommand, historyCommand, configCommand];

function showHelp(): void {
  console.log('Flightmill diagnostics');
  console.log('');
  console.log('Usage: flightmill <command> [options]');
  console.log('');
  console.log('Commands:');
  for (const cmd of commands) {
    console.log(`  ${cmd.name.padEnd(16)} ${cmd.description}`);
  }
  console.log('');
  console.log('Options:');
  console.log('  --version        Show version');
  console.log('  --help           Show help');
  console.log('');
  console.log('Run "flightmill <command> --help" for command-specific help.');
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.includes('--version') || args.includes('-v')) {
    console.log(`flightmill ${VERSION}`);
    return;
  }

  if (args.length === 0 || (args.length === 1 && (args[0] === '--help' || args[0] === '-h'))) {
    showHelp();
    return;
  }

  const commandName = args[0];
  const command = commands.find((c) => c.name === commandName);

  if (!command) {
    console.error(`Unknown command: ${commandName}`);
    console.log('Run "flightmill --help" for available commands.');
    process.exit(2);
  }

  if (args.includes('--help') || args.includes('-h')) {
    console.log(`Usage: ${command.usage}`);
    return;
  }

  try {
    await command.handler(args.slice(1));
  } catch (error) {
    if (error instanceof DiagnosticsError) {
      console.error(`Error [${error.code}]: ${error.message}`);
    } else {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    }
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
