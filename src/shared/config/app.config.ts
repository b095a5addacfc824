export interface AppConfig {
  port: number;
  nodeEnv: string;
  logLevel: string;
  prettyLogs: boolean;
  databasePath: string;
  seedDatabase: boolean;
  maxPageSize: number;
  corsOrigins: string[] | true;
}

const DEFAULT_LOG_LEVELS: Record<string, string> = {
  production: 'info',
  test: 'silent',
};

function parsePositiveInt(
  name: string,
  raw: string | undefined,
  fallback: number,
): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${name} must be a positive integer, got '${raw}'`);
  }
  return value;
}

export function loadAppConfig(
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  const nodeEnv = env.NODE_ENV ?? 'development';
  const corsOrigins = (env.CORS_ORIGINS ?? '')
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin !== '');

  return {
    port: parsePositiveInt('PORT', env.PORT, 3000),
    nodeEnv,
    logLevel: env.LOG_LEVEL ?? DEFAULT_LOG_LEVELS[nodeEnv] ?? 'debug',
    prettyLogs: nodeEnv === 'development',
    databasePath: env.DATABASE_PATH ?? './data/customers.db',
    seedDatabase: env.SEED_DATABASE !== 'false',
    maxPageSize: parsePositiveInt('MAX_PAGE_SIZE', env.MAX_PAGE_SIZE, 100),
    corsOrigins: corsOrigins.length > 0 ? corsOrigins : true,
  };
}
