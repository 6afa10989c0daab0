import fs from 'fs-extra';
import { z } from 'zod';
import { Selection, SYNC_ACTIONS, SyncAction } from '../types/plan.js';

const actionSchema = z.enum(SYNC_ACTIONS);

// Object keys that look like integers iterate first, so only the list form
// keeps the order of tables named like `2024`.
export const selectionFileSchema = z.union([
  z.array(z.object({ table: z.string().min(1), action: actionSchema })),
  z.record(z.string().min(1), actionSchema),
]);

export function parseSelection(input: unknown): Selection {
  const parsed = selectionFileSchema.parse(input);
  if (Array.isArray(parsed)) {
    return new Map(parsed.map((entry): [string, SyncAction] => [entry.table, entry.action]));
  }
  return new Map(Object.entries(parsed));
}

export async function loadSelection(filePath: string): Promise<Selection> {
  return parseSelection(await fs.readJson(filePath));
}
