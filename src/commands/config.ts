import { Command } from 'commander';
import { getAllSettings, getSetting } from '../db/queries.js';
import { updateSetting } from '../core/store.js';
import { getContext, handleError } from './shared.js';

export function configCommand(): Command {
  return new Command('config')
    .description('Get or set runtime settings')
    .argument('[key]', 'setting key (retention-days, default-reservation-ttl-seconds)')
    .argument('[value]', 'value to set')
    .action((key: string | undefined, value: string | undefined, options, cmd: Command) => {
      try {
        const { db, jsonMode } = getContext(cmd);

        if (!key) {
          const settings = getAllSettings(db);
          db.close();

          if (jsonMode) {
            console.log(JSON.stringify(settings));
          } else if (settings.length === 0) {
            console.log('No settings');
          } else {
            console.log('Settings:');
            for (const { key: name, value: current } of settings) {
              console.log(`  ${name}: ${current}`);
            }
          }
          return;
        }

        if (value === undefined) {
          // Normalize key: retention-days -> retention_days
          const normalizedKey = key.replace(/-/g, '_');
          const current = getSetting(db, normalizedKey);
          db.close();

          if (current === undefined) {
            throw new Error(`Setting '${key}' not found`);
          }
          if (jsonMode) {
            console.log(JSON.stringify({ [normalizedKey]: current }));
          } else {
            console.log(`${normalizedKey}: ${current}`);
          }
          return;
        }

        const stored = updateSetting(db, key, value);
        const current = getSetting(db, stored);
        db.close();

        if (jsonMode) {
          console.log(JSON.stringify({ [stored]: current }));
        } else {
          console.log(`Set ${stored} = ${current}`);
        }
      } catch (error) {
        handleError(error);
      }
    });
}
