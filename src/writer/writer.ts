import fs from 'fs-extra';
import path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { logger } from '../utils/logger.js';

export type ScriptKind = 'structure' | 'data';

export class SQLWriter {
  constructor(
    private outputDir: string,
    private baseName: string = 'sync_database'
  ) {}

  getFilePath(kind: ScriptKind): string {
    return path.join(this.outputDir, `${this.baseName}_${kind}.sql`);
  }

  // One statement per line; an empty script writes no file.
  async save(kind: ScriptKind, statements: readonly string[]): Promise<string | null> {
    if (statements.length === 0) return null;

    const filePath = this.getFilePath(kind);
    await fs.ensureDir(this.outputDir);

    await pipeline(
      Readable.from(statements.map(statement => `${statement}\n`)),
      fs.createWriteStream(filePath, { flags: 'w', encoding: 'utf8' })
    );

    logger.info(`${kind === 'structure' ? 'Structure' : 'Data'} SQL saved to: ${filePath}`);
    return filePath;
  }
}
