import { fileURLToPath } from 'node:url';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type EngineEnv = {
  nodeEnv: string;
  logLevel: LogLevel;
  ruleCatalogPath: string;
};

export const DEFAULT_RULE_CATALOG_PATH = fileURLToPath(
  new URL('../../data/authority-rules.json', import.meta.url)
);

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function parseLogLevel(env: NodeJS.ProcessEnv, nodeEnv: string): LogLevel {
  const raw = (env.LOG_LEVEL ?? '').trim().toLowerCase();
  if (!raw) return nodeEnv === 'production' ? 'info' : 'debug';
  if (!isLogLevel(raw)) {
    throw new Error(`Invalid LOG_LEVEL: expected one of ${LOG_LEVELS.join(', ')}, got "${raw}"`);
  }
  return raw;
}

export function validateEngineEnv(env: NodeJS.ProcessEnv = process.env): EngineEnv {
  const nodeEnv = (env.NODE_ENV ?? 'development').trim() || 'development';

  return {
    nodeEnv,
    logLevel: parseLogLevel(env, nodeEnv),
    ruleCatalogPath: (env.RULE_CATALOG_PATH ?? '').trim() || DEFAULT_RULE_CATALOG_PATH,
  };
}
