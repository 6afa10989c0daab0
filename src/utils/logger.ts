import { pino } from 'pino';

const level = process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info');
const pretty = process.stdout.isTTY && process.env.NODE_ENV !== 'test';

export const logger = pino({
  name: 'schemasync',
  level,
  ...(pretty
    ? {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'SYS:HH:MM:ss', ignore: 'pid,hostname,name' },
        },
      }
    : {}),
});
