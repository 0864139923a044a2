import { writeFileSync } from 'node:fs';
import { Command } from 'commander';
import { exportTasks } from '@tasklane/core';
import { toWireTask } from '@tasklane/server';
import * as out from '../output.js';
import { withDb, $try } from '../helpers.js';
import type { GlobalOptions } from '../helpers.js';

export function createExportCommand(): Command {
  return new Command('export')
    .description('Export every task as JSON (roots first), to a file or stdout')
    .argument('[file]', 'Output file; stdout when omitted')
    .action((file: string | undefined, _opts: unknown, cmd: Command) => $try(() => {
      const tasks = withDb(cmd.optsWithGlobals<GlobalOptions>(), exportTasks);
      const json = JSON.stringify(tasks.map(toWireTask), null, 2);

      if (!file) {
        console.log(json);
        return;
      }
      writeFileSync(file, json + '\n');
      out.success(`Exported ${tasks.length} task(s) to ${file}`);
    }));
}
