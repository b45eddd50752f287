import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { statusCommand } from './commands/status.js';
import { pruneCommand } from './commands/prune.js';
import { configCommand } from './commands/config.js';

const VERSION = '0.1.0';

export function main(argv: string[] = process.argv) {
  const program = new Command();

  program
    .name('switchboard')
    .description('Agent coordination store - contact policy, file reservations, threaded mail')
    .version(VERSION)
    .option('--db <path>', 'database file (default: $SWITCHBOARD_DB or ~/.config/switchboard/switchboard.db)')
    .option('--json', 'output in JSON format');

  program.addCommand(initCommand());
  program.addCommand(statusCommand());
  program.addCommand(pruneCommand());
  program.addCommand(configCommand());

  program.parse(argv);
}
