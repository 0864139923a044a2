import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import { importTasks, parseOrThrow, importBatchSchema, CONFLICT_POLICIES } from '@tasklane/core';
import type { ConflictPolicy, ImportRecord } from '@tasklane/core';
import { fromWireList } from '@tasklane/server';
import * as out from '../output.js';
import { withDb, parseConflictPolicy, $try } from '../helpers.js';
import type { GlobalOptions } from '../helpers.js';

interface ImportOptions extends GlobalOptions {
  onConflict: ConflictPolicy;
  validateOnly?: boolean;
}

/** Parse an export file: a JSON array of snake_case task records */
export function readImportFile(file: string): ImportRecord[] {
  let document: unknown;
  try {
    document = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (err) {
    throw new Error(`Cannot read ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseOrThrow(importBatchSchema, fromWireList(document), 'Invalid import payload');
}

export function createImportCommand(): Command {
  return new Command('import')
    .description('Import tasks from an export file, keeping ids and timestamps')
    .argument('<file>', 'JSON file as written by the export command')
    .option('--on-conflict <policy>', `What to do with existing ids (${CONFLICT_POLICIES.join(', ')})`, parseConflictPolicy, 'fail')
    .option('--validate-only', 'Run every check without writing')
    .action((file: string, _opts: unknown, cmd: Command) => $try(() => {
      const g = cmd.optsWithGlobals<ImportOptions>();
      const records = readImportFile(file);
      const result = withDb(g, db => importTasks(db, records, {
        onConflict: g.onConflict,
        validateOnly: g.validateOnly ?? false,
      }));

      if (result.validateOnly) {
        out.info(`Validation passed: ${result.importedCount} task(s) would be imported`);
      } else {
        out.success(`Imported ${result.importedCount} task(s) from ${file}`);
      }
      const skipped = records.length - result.importedCount;
      if (skipped > 0) out.warning(`Skipped ${skipped} existing task(s)`);
    }));
}
