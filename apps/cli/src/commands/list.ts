import { Command } from 'commander';
import chalk from 'chalk';
import { listTasks, parseOrThrow, taskListQuerySchema, SORT_FIELDS, SORT_ORDERS } from '@tasklane/core';
import { toWirePage } from '@tasklane/server';
import * as out from '../output.js';
import { withDb, collect, parseIntArg, $try } from '../helpers.js';
import type { GlobalOptions } from '../helpers.js';

interface ListOptions extends GlobalOptions {
  completed?: boolean;
  open?: boolean;
  archived?: boolean;
  tag: string[];
  search?: string;
  parent?: string;
  overdue?: boolean;
  sort: string;
  order: string;
  limit: number;
  offset: number;
  json?: boolean;
}

export function createListCommand(): Command {
  return new Command('list')
    .description('List tasks (root tasks unless --parent is given)')
    .option('-c, --completed', 'Show only completed tasks')
    .option('-o, --open', 'Show only tasks not completed')
    .option('--archived', 'Show only archived tasks')
    .option('-t, --tag <tag>', 'Require a tag (repeatable, all must match)', collect, [])
    .option('-s, --search <term>', 'Substring of title or description')
    .option('--parent <id>', 'List the direct subtasks of a task')
    .option('--overdue', 'Show only overdue tasks')
    .option('--sort <field>', `Sort key (${SORT_FIELDS.join(', ')})`, 'created_at')
    .option('--order <order>', `Sort order (${SORT_ORDERS.join(', ')})`, 'desc')
    .option('-n, --limit <n>', 'Page size', parseIntArg, 100)
    .option('--offset <n>', 'Rows to skip', parseIntArg, 0)
    .option('--json', 'Print the page as JSON')
    .action((_opts: unknown, cmd: Command) => $try(() => {
      const g = cmd.optsWithGlobals<ListOptions>();

      if (g.completed && g.open) {
        out.error('Cannot use both --completed and --open at the same time');
        process.exitCode = 1;
        return;
      }

      const query = parseOrThrow(taskListQuerySchema, {
        completed: g.completed ? true : g.open ? false : undefined,
        archived: g.archived,
        tag: g.tag,
        search: g.search,
        parentId: g.parent,
        overdue: g.overdue,
        sortBy: g.sort,
        order: g.order,
        limit: g.limit,
        offset: g.offset,
      }, 'Invalid list options');

      const page = withDb(g, db => listTasks(db, query));

      if (g.json) {
        console.log(JSON.stringify(toWirePage(page), null, 2));
        return;
      }

      if (page.data.length === 0) {
        out.info(out.formatPageSummary(page));
        return;
      }
      for (const task of page.data) {
        console.log(out.formatTask(task));
      }
      out.info(chalk.dim(out.formatPageSummary(page)));
    }));
}
