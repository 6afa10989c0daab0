import fs from 'fs-extra';
import { z } from 'zod';
import { ConnectionConfig, DbType } from '../types/index.js';

export const dbConfigSchema = z.object({
  host: z.string().default('localhost'),
  port: z.union([z.string(), z.number()]).default('3306').pipe(z.coerce.number().int().positive()),
  database: z.string().min(1),
  user: z.string().min(1),
  password: z.string().optional(),
});

export const syncConfigSchema = z.object({
  engine: z.enum(['mysql', 'mariadb']).default('mariadb'),
  source: dbConfigSchema,
  target: dbConfigSchema,
});

export interface SyncConfig {
  engine: DbType;
  source: ConnectionConfig;
  target: ConnectionConfig;
}

export interface ConnectionFlags {
  engine?: string;
  config?: string;
  sHost?: string;
  sPort?: string;
  sDb?: string;
  sUser?: string;
  sPass?: string;
  tHost?: string;
  tPort?: string;
  tDb?: string;
  tUser?: string;
  tPass?: string;
}

// Flags win over the --config file
export async function loadSyncConfig(flags: ConnectionFlags): Promise<SyncConfig> {
  const fromFile: unknown = flags.config ? await fs.readJson(flags.config) : {};
  const file = z
    .object({
      engine: z.string().optional(),
      source: z.record(z.unknown()).optional(),
      target: z.record(z.unknown()).optional(),
    })
    .parse(fromFile);

  const pick = (...values: (string | undefined)[]) => values.find(v => v !== undefined);

  return syncConfigSchema.parse({
    engine: pick(flags.engine, file.engine),
    source: {
      ...file.source,
      ...definedOnly({ host: flags.sHost, port: flags.sPort, database: flags.sDb, user: flags.sUser, password: flags.sPass }),
    },
    target: {
      ...file.target,
      ...definedOnly({ host: flags.tHost, port: flags.tPort, database: flags.tDb, user: flags.tUser, password: flags.tPass }),
    },
  });
}

function definedOnly(values: Record<string, string | undefined>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}
