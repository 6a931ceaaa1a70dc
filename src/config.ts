import * as dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
dotenv.config();

// Zod validation schema
const ConfigSchema = z.object({
  service: z.object({
    name: z.string().min(1, 'Service name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    logLevel: z.enum(['error', 'warn', 'info', 'debug']),
  }),
  http: z.object({
    host: z.string().min(1, 'Host must not be empty'),
    port: z.number().int().min(0).max(65535),
  }),
  pool: z.object({
    mode: z.enum(['inline', 'process']),
    maxWorkers: z.number().int().min(1).max(64),
    maxPending: z.number().int().min(0),
    maxBatchSize: z.number().int().min(1).max(10000),
  }),
  reaper: z.object({
    cleanupIntervalSeconds: z.number().int().min(1),
    resultTtlSeconds: z.number().int().min(0),
  }),
  shutdown: z.object({
    graceMs: z.number().int().min(0).max(600000),
    killGraceMs: z.number().int().min(0).max(600000),
  }),
  classifier: z.object({
    apiUrl: z.string().url('Invalid classifier URL format'),
    model: z.string().min(1, 'Classifier model must not be empty'),
    apiToken: z.string().min(1).optional(),
    timeoutMs: z.number().int().min(100),
    retryAttempts: z.number().int().min(1).max(10),
    retryInitialDelayMs: z.number().int().min(0).max(60000),
    retryMaxDelayMs: z.number().int().min(0).max(600000),
  }),
  mcp: z.object({
    enabled: z.boolean(),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse command line arguments
 * Usage: node dist/src/index.js --port 8000 --max-workers 2 --pool-mode inline --mcp
 */
export function parseArgs(argv: string[]): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);

      // Check if next arg is a value or another flag
      if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Build and validate configuration from CLI arguments, environment and
 * defaults (in that order of precedence). Throws a ZodError when invalid.
 */
export function loadConfig(argv: string[], env: NodeJS.ProcessEnv): Config {
  const cliArgs = parseArgs(argv);

  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || defaultValue;
  };

  const getOptionalString = (envKey: string): string | undefined => env[envKey] || undefined;

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    if (cliArgs[cliKey] !== undefined) return cliArgs[cliKey] === true || cliArgs[cliKey] === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : (envValue === 'false' ? false : defaultValue);
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return Number(cliValue);
    const envValue = env[envKey];
    return envValue ? Number(envValue) : defaultValue;
  };

  const rawConfig = {
    service: {
      name: getString('service-name', 'SERVICE_NAME', 'batch-classifier'),
      version: getString('service-version', 'SERVICE_VERSION', '1.0.0'),
      logLevel: getString('log-level', 'LOG_LEVEL', 'info'),
    },
    http: {
      host: getString('host', 'HOST', '0.0.0.0'),
      port: getNumber('port', 'PORT', 8000),
    },
    pool: {
      mode: getString('pool-mode', 'POOL_MODE', 'process'),
      maxWorkers: getNumber('max-workers', 'MAX_WORKERS', 1),
      maxPending: getNumber('max-pending', 'POOL_MAX_PENDING', 1000),
      maxBatchSize: getNumber('max-batch-size', 'MAX_BATCH_SIZE', 100),
    },
    reaper: {
      cleanupIntervalSeconds: getNumber('cleanup-interval', 'CLEANUP_INTERVAL', 300),
      resultTtlSeconds: getNumber('result-ttl', 'RESULT_TTL', 3600),
    },
    shutdown: {
      graceMs: getNumber('shutdown-grace', 'SHUTDOWN_GRACE_MS', 5000),
      killGraceMs: getNumber('kill-grace', 'SHUTDOWN_KILL_GRACE_MS', 2000),
    },
    classifier: {
      apiUrl: getString('classifier-url', 'CLASSIFIER_API_URL', 'http://localhost:8080'),
      model: getString('classifier-model', 'CLASSIFIER_MODEL', 'facebook/bart-large-mnli'),
      apiToken: getOptionalString('CLASSIFIER_API_TOKEN'),
      timeoutMs: getNumber('classifier-timeout', 'CLASSIFIER_TIMEOUT_MS', 30000),
      retryAttempts: getNumber('retry-attempts', 'RETRY_MAX_ATTEMPTS', 3),
      retryInitialDelayMs: getNumber('retry-initial-delay', 'RETRY_INITIAL_DELAY_MS', 500),
      retryMaxDelayMs: getNumber('retry-max-delay', 'RETRY_MAX_DELAY_MS', 4000),
    },
    mcp: {
      enabled: getBoolean('mcp', 'MCP_ENABLED', false),
    },
  };

  return ConfigSchema.parse(rawConfig);
}

/**
 * Get configuration for this process, exiting with a readable report when
 * it does not validate
 */
export function getConfig(): Config {
  try {
    return loadConfig(process.argv, process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('\nConfiguration Validation Failed!\n');
      console.error('Errors:');
      error.errors.forEach(err => {
        const path = err.path.join('.');
        console.error(`  - ${path || 'root'}: ${err.message}`);
      });
      console.error('\nTips:');
      console.error('  - Check your .env file (see .env.example)');
      console.error('  - Verify CLI arguments');
      console.error('  - Numeric settings must be integers');
      console.error();
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Print the effective configuration
 */
export function printConfigInfo(config: Config): void {
  console.error('='.repeat(68));
  console.error(`  ${config.service.name} v${config.service.version}`);
  console.error('='.repeat(68));
  console.error(`HTTP:       http://${config.http.host}:${config.http.port}`);
  console.error(`Pool:       ${config.pool.mode} | ${config.pool.maxWorkers} worker(s) | ${config.pool.maxPending} pending max | batch <= ${config.pool.maxBatchSize}`);
  console.error(`Reaper:     every ${config.reaper.cleanupIntervalSeconds}s | keep results ${config.reaper.resultTtlSeconds}s`);
  console.error(`Shutdown:   grace ${config.shutdown.graceMs}ms | kill grace ${config.shutdown.killGraceMs}ms`);
  console.error(`Classifier: ${config.classifier.model} @ ${config.classifier.apiUrl} | retry ${config.classifier.retryAttempts}x (${config.classifier.retryInitialDelayMs}-${config.classifier.retryMaxDelayMs}ms)`);
  console.error(`MCP stdio:  ${config.mcp.enabled ? 'enabled' : 'disabled'}`);
  console.error('-'.repeat(68));
}
