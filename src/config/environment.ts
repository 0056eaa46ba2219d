export interface AppConfig {
  database: {
    path: string;
    synchronize: boolean;
  };
  redis: {
    host: string;
    port: number;
  };
  server: {
    port: number;
    nodeEnv: string;
  };
  tracking: {
    allocatorMaxAttempts: number;
    bulkMaxQuantity: number;
    bootstrapAdminEmployeeId?: string;
  };
  notifications: {
    enabled: boolean;
  };
}

function parseFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    database: {
      path: env.DATABASE_PATH || './data/tracking.sqlite',
      synchronize: parseFlag(env.DATABASE_SYNCHRONIZE, true),
    },
    redis: {
      host: env.REDIS_HOST || 'localhost',
      port: parseInt(env.REDIS_PORT || '6379'),
    },
    server: {
      port: parseInt(env.PORT || '4000'),
      nodeEnv: env.NODE_ENV || 'development',
    },
    tracking: {
      allocatorMaxAttempts: parseInt(env.ALLOCATOR_MAX_ATTEMPTS || '100'),
      bulkMaxQuantity: parseInt(env.BULK_MAX_QUANTITY || '100'),
      bootstrapAdminEmployeeId: env.BOOTSTRAP_ADMIN_EMPLOYEE_ID || undefined,
    },
    notifications: {
      enabled: parseFlag(env.NOTIFICATIONS_ENABLED, true),
    },
  };
}
