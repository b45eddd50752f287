import { Command } from 'commander';
import fs from 'fs';
import { resolveDbPath } from '../core/config.js';
import { openStore } from '../core/store.js';
import { handleError } from './shared.js';

interface InitResult {
  initialized: boolean;
  already_existed: boolean;
  path: string;
}

export function initCommand(): Command {
  return new Command('init')
    .description('Create the coordination database and schema')
    .action((options, cmd: Command) => {
      try {
        const opts = cmd.optsWithGlobals<{ db?: string; json?: boolean }>();
        const dbPath = resolveDbPath(opts.db);
        const alreadyExisted = fs.existsSync(dbPath);

        const db = openStore(dbPath);
        db.close();

        const result: InitResult = {
          initialized: true,
          already_existed: alreadyExisted,
          path: dbPath,
        };

        if (opts.json) {
          console.log(JSON.stringify(result, null, 2));
        } else if (alreadyExisted) {
          console.log(`Already initialized: ${dbPath}`);
        } else {
          console.log(`Initialized ${dbPath}`);
        }
      } catch (error) {
        handleError(error);
      }
    });
}
