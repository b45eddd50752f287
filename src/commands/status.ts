import { Command } from 'commander';
import { getStats } from '../db/queries.js';
import { now } from '../core/time.js';
import { getContext, handleError } from './shared.js';

export function statusCommand(): Command {
  return new Command('status')
    .description('Show counts of projects, agents, messages and active reservations')
    .action((options, cmd: Command) => {
      try {
        const { db, dbPath, jsonMode } = getContext(cmd);
        const stats = getStats(db, now());
        db.close();

        if (jsonMode) {
          console.log(JSON.stringify({ path: dbPath, ...stats }, null, 2));
          return;
        }

        console.log(`Database: ${dbPath}`);
        console.log(`  projects:             ${stats.projects}`);
        console.log(`  active agents:        ${stats.agents}`);
        console.log(`  messages:             ${stats.messages}`);
        console.log(`  active reservations:  ${stats.reservations_active}`);
        console.log(`  pending links:        ${stats.links_pending}`);
      } catch (error) {
        handleError(error);
      }
    });
}
