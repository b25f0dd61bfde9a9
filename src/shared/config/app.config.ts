import { isAbsolute, join } from 'node:path';
import type { DataFilePaths } from '../../customer/application/interfaces/customer-repository.interface';

export type LogLevel =
  | 'fatal'
  | 'error'
  | 'warn'
  | 'info'
  | 'debug'
  | 'trace'
  | 'silent';

export interface AppConfig {
  port: number;
  dataDir: string;
  files: DataFilePaths;
  saveOnShutdown: boolean;
  log: {
    level: LogLevel;
    pretty: boolean;
  };
}

const LOG_LEVELS: readonly LogLevel[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function resolveLogLevel(env: NodeJS.ProcessEnv): LogLevel {
  const requested = env.LOG_LEVEL?.toLowerCase();
  if (requested && isLogLevel(requested)) return requested;
  if (env.NODE_ENV === 'test') return 'silent';
  return env.NODE_ENV === 'production' ? 'info' : 'debug';
}

function resolvePort(raw: string | undefined): number {
  const port = Number(raw);
  return Number.isInteger(port) && port > 0 ? port : 3000;
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const dataDir = env.CRM_DATA_DIR || './data';
  const inDataDir = (file: string) =>
    isAbsolute(file) ? file : join(dataDir, file);

  return {
    port: resolvePort(env.PORT),
    dataDir,
    files: {
      customersFile: inDataDir(env.CRM_CUSTOMERS_FILE || 'customers.txt'),
      interactionsFile: inDataDir(
        env.CRM_INTERACTIONS_FILE || 'interactions.txt',
      ),
    },
    saveOnShutdown: env.CRM_SAVE_ON_SHUTDOWN !== 'false',
    log: {
      level: resolveLogLevel(env),
      pretty: env.NODE_ENV !== 'production' && env.NODE_ENV !== 'test',
    },
  };
}
