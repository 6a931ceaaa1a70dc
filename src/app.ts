import { Config } from './config.js';
import { JobOrchestrator } from './application/services/JobOrchestrator.js';
import { JobReaper } from './application/services/JobReaper.js';
import { ShutdownCoordinator } from './application/services/ShutdownCoordinator.js';
import { IClassifierBackend } from './core/interfaces/IClassifierBackend.js';
import { IExecutionPool } from './core/interfaces/IExecutionPool.js';
import { IJobRegistry } from './core/interfaces/IJobRegistry.js';
import { CancellationDirectory } from './infrastructure/cancellation/CancellationDirectory.js';
import { createClassifierApiClient } from './infrastructure/http/ClassifierApiClient.js';
import { LazyClassifierBackend } from './infrastructure/http/LazyClassifierBackend.js';
import { InlineExecutionPool } from './infrastructure/pool/InlineExecutionPool.js';
import { ProcessExecutionPool } from './infrastructure/pool/ProcessExecutionPool.js';
import { InMemoryJobRegistry } from './infrastructure/registry/InMemoryJobRegistry.js';
import { WebServer } from './infrastructure/web/WebServer.js';
import { McpServer } from './presentation/McpServer.js';

/**
 * Replacements for the pieces that touch the outside world
 */
export interface ApplicationOverrides {
  registry?: IJobRegistry;
  backend?: IClassifierBackend;
  pool?: IExecutionPool;
  exit?: (code: number) => void;
}

export interface Application {
  config: Config;
  registry: IJobRegistry;
  cancellations: CancellationDirectory;
  pool: IExecutionPool;
  orchestrator: JobOrchestrator;
  reaper: JobReaper;
  web: WebServer;
  mcp: McpServer | null;
  shutdown: ShutdownCoordinator;
  /**
   * Start the reaper and the HTTP server (and MCP over stdio when enabled)
   */
  start(): Promise<void>;
}

function createPool(config: Config, backend?: IClassifierBackend): IExecutionPool {
  const options = { maxWorkers: config.pool.maxWorkers, maxPending: config.pool.maxPending };
  if (config.pool.mode === 'inline' || backend) {
    const jobBackend = backend ?? new LazyClassifierBackend(() => createClassifierApiClient(config.classifier));
    return new InlineExecutionPool(jobBackend, options);
  }
  return new ProcessExecutionPool(options);
}

/**
 * Wire every component from configuration
 */
export function createApplication(config: Config, overrides: ApplicationOverrides = {}): Application {
  const registry = overrides.registry ?? new InMemoryJobRegistry();
  const cancellations = new CancellationDirectory();
  const pool = overrides.pool ?? createPool(config, overrides.backend);

  const orchestrator = new JobOrchestrator(registry, cancellations, pool, {
    maxBatchSize: config.pool.maxBatchSize,
  });
  const reaper = new JobReaper(registry, cancellations, {
    intervalMs: config.reaper.cleanupIntervalSeconds * 1000,
    retentionMs: config.reaper.resultTtlSeconds * 1000,
  });
  const web = new WebServer(orchestrator, { host: config.http.host, port: config.http.port });
  const mcp = config.mcp.enabled
    ? new McpServer({
        name: config.service.name,
        version: config.service.version,
        orchestrator,
        pool,
        // health-check client, separate from the backend the jobs use
        classifier: createClassifierApiClient(config.classifier),
      })
    : null;

  const shutdown = new ShutdownCoordinator({
    orchestrator,
    pool,
    reaper,
    closables: [
      { name: 'HTTP server', close: () => web.stop() },
      ...(mcp ? [{ name: 'MCP transport', close: () => mcp.close() }] : []),
    ],
    graceMs: config.shutdown.graceMs,
    killGraceMs: config.shutdown.killGraceMs,
    exit: overrides.exit,
  });

  return {
    config,
    registry,
    cancellations,
    pool,
    orchestrator,
    reaper,
    web,
    mcp,
    shutdown,
    async start() {
      reaper.start();
      await web.start();
      if (mcp) {
        await mcp.start();
      }
    },
  };
}
