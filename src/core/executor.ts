import { IDbConnection } from '../engines/interfaces.js';
import { logger } from '../utils/logger.js';
import { StatementApplyError } from './errors.js';

export interface ExecutionOptions {
  transactional?: boolean;
  progressEvery?: number;
}

export interface ExecutionReport {
  executed: number;
  failures: StatementApplyError[];
  status: 'succeeded' | 'failed';
}

export function isExecutable(line: string): boolean {
  const trimmed = line.trim();
  return trimmed.length > 0 && !trimmed.startsWith('--');
}

// Failed statements are skipped; the rest still commit
export class StatementExecutor {
  constructor(private db: IDbConnection) {}

  async apply(statements: readonly string[], options: ExecutionOptions = {}): Promise<ExecutionReport> {
    const transactional = options.transactional ?? true;
    const progressEvery = options.progressEvery ?? 10;
    const executable = statements.filter(isExecutable);
    const failures: StatementApplyError[] = [];
    let executed = 0;

    logger.info({ database: this.db.database, statements: executable.length }, 'Applying structural changes');

    await this.db.withSession(async session => {
      if (transactional) await session.execute('START TRANSACTION');

      for (const [index, statement] of executable.entries()) {
        try {
          await session.execute(statement);
          executed++;
          if (executed % progressEvery === 0) {
            logger.info(`Executed ${executed}/${executable.length} statements...`);
          }
        } catch (error) {
          const failure = new StatementApplyError(index, statement, error);
          failures.push(failure);
          logger.error({ statement: statement.slice(0, 120), error: failure.message }, 'Statement failed; continuing');
        }
      }

      if (transactional) await session.execute('COMMIT');
    });

    const status = failures.length > 0 ? 'failed' : 'succeeded';
    logger.info({ executed, failed: failures.length, status }, 'Finished applying statements');
    return { executed, failures, status };
  }
}
