import * as p from '@clack/prompts';
import pc from 'picocolors';
import { ComparisonResult } from '../types/comparison.js';
import { SchemaModel } from '../types/index.js';
import { Selection, SYNC_ACTIONS, SyncAction } from '../types/plan.js';
import { printTableDetail } from './report.js';

type Choice = SyncAction | 'details';

function isChoice(value: unknown): value is Choice {
  return value === 'details' || SYNC_ACTIONS.some(action => action === value);
}

// null means the operator cancelled: build no plan
export async function promptSelection(
  result: ComparisonResult,
  source: SchemaModel,
  target: SchemaModel
): Promise<Selection | null> {
  const { classification, details } = result;
  const selection = new Map<string, SyncAction>();

  p.intro(pc.bgCyan(pc.black(' Table selection ')));

  const pending = [...classification.newTables, ...classification.modifiedTables];
  for (const [index, table] of pending.entries()) {
    const detail = details.get(table);
    const rows = (detail?.sourceRows ?? 0).toLocaleString('en-US');
    const label = detail?.status === 'NEW' ? pc.green('new') : pc.yellow('modified');

    let action: SyncAction | null = null;
    while (action === null) {
      const choice = await p.select({
        message: `[${index + 1}/${pending.length}] ${table} (${label}, ~${rows} records)`,
        options: [
          { value: 'structure_only', label: 'Structure only' },
          { value: 'structure_and_data', label: 'Structure + data', hint: 'TRUNCATE plus export instructions' },
          { value: 'skip', label: 'Skip' },
          { value: 'details', label: 'Show table details' },
        ],
      });

      if (p.isCancel(choice) || !isChoice(choice)) {
        p.cancel('Operation cancelled by user.');
        return null;
      }

      if (choice === 'details') {
        if (detail) printTableDetail(detail, source, target);
      } else {
        action = choice;
      }
    }
    selection.set(table, action);
  }

  for (const table of classification.removedTables) {
    const rows = (details.get(table)?.targetRows ?? 0).toLocaleString('en-US');
    const drop = await p.confirm({
      message: `${pc.red(table)} exists only in the target (~${rows} records). Drop it?`,
      initialValue: false,
    });

    if (p.isCancel(drop)) {
      p.cancel('Operation cancelled by user.');
      return null;
    }
    selection.set(table, drop ? 'drop' : 'skip');
  }

  p.outro(`${selection.size} tables reviewed`);
  return selection;
}

export async function confirmApply(database: string, statements: number): Promise<boolean> {
  const apply = await p.confirm({
    message: `Execute ${statements} structure commands on ${pc.cyan(database)} now?`,
    initialValue: false,
  });
  return !p.isCancel(apply) && apply;
}
