export type WorkerConfig = {
  apiBaseUrl: string;
  queueName: string;
  cronPattern: string;
  timeZone: string;
  requestTimeoutMs: number;
  maxAttempts: number;
  retryDelayMs: number;
  metricsPort: number;
  redis: {
    host: string;
    port: number;
    password?: string;
  };
};

export function readWorkerConfig(env: NodeJS.ProcessEnv = process.env): WorkerConfig {
  return {
    apiBaseUrl: (env.API_BASE_URL ?? 'http://localhost:3000').replace(/\/+$/, ''),
    queueName: env.BULLMQ_DISPATCH_QUEUE ?? 'dispatch.cycle',
    cronPattern: env.DISPATCH_CRON ?? '*/15 * * * *',
    timeZone: env.DISPATCH_TIMEZONE ?? 'UTC',
    requestTimeoutMs: Number(env.DISPATCH_REQUEST_TIMEOUT_MS ?? 300_000),
    maxAttempts: Number(env.BULLMQ_MAX_ATTEMPTS ?? 5),
    retryDelayMs: Number(env.BULLMQ_RETRY_DELAY_MS ?? 30_000),
    metricsPort: Number(env.WORKER_METRICS_PORT ?? 9464),
    redis: {
      host: env.REDIS_HOST ?? '127.0.0.1',
      port: Number(env.REDIS_PORT ?? 6379),
      password: env.REDIS_PASSWORD
    }
  };
}
