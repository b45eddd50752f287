import { Command } from 'commander';
import { pruneMessages } from '../core/messages.js';
import { pruneReservations } from '../core/reservations.js';
import { getNumberSetting } from '../core/store.js';
import { getContext, handleError, parsePositiveInt } from './shared.js';

const DEFAULT_RETENTION_DAYS = 30;

export function pruneCommand(): Command {
  return new Command('prune')
    .description('Delete old messages and stale reservations')
    .option('--days <n>', 'retention in days (default: retention_days setting)')
    .action((options: { days?: string }, cmd: Command) => {
      try {
        const { db, jsonMode } = getContext(cmd);
        const days = options.days !== undefined
          ? parsePositiveInt(options.days, '--days')
          : getNumberSetting(db, 'retention_days', DEFAULT_RETENTION_DAYS);

        const messages = pruneMessages(db, days);
        const reservations = pruneReservations(db, days);
        db.close();

        if (jsonMode) {
          console.log(JSON.stringify({ days, messages, reservations }, null, 2));
        } else {
          console.log(`Pruned ${messages} message${messages !== 1 ? 's' : ''} and ${reservations} reservation${reservations !== 1 ? 's' : ''} older than ${days} days`);
        }
      } catch (error) {
        handleError(error);
      }
    });
}
