import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { JobOrchestrator } from '../../application/services/JobOrchestrator.js';
import { IExecutionPool, PoolStats } from '../../core/interfaces/IExecutionPool.js';
import { ServiceHealth } from '../../core/entities/ClassificationJob.js';
import { CircuitState } from '../../utils/retry.js';
import { errorResult, textResult } from './JobManagementTools.js';

/**
 * What the health check asks of the classifier client
 */
export interface ClassifierProbe {
  healthCheck(): Promise<boolean>;
  getCircuitBreakerState(): CircuitState;
}

export interface HealthReport {
  timestamp: string;
  status: 'healthy' | 'degraded' | 'shutting_down';
  service: ServiceHealth;
  pool: PoolStats;
  classifier?: {
    reachable: boolean;
    circuitBreaker: CircuitState;
  };
}

export async function buildHealthReport(
  orchestrator: JobOrchestrator,
  pool: IExecutionPool,
  classifier?: ClassifierProbe
): Promise<HealthReport> {
  const service = orchestrator.health();
  const report: HealthReport = {
    timestamp: new Date().toISOString(),
    status: service.status,
    service,
    pool: pool.stats(),
  };

  if (classifier) {
    const reachable = await classifier.healthCheck();
    report.classifier = { reachable, circuitBreaker: classifier.getCircuitBreakerState() };
    if (!reachable && report.status === 'healthy') {
      report.status = 'degraded';
    }
  }

  return report;
}

export function createHealthCheckHandler(
  orchestrator: JobOrchestrator,
  pool: IExecutionPool,
  classifier?: ClassifierProbe
): () => Promise<CallToolResult> {
  return async () => {
    try {
      const report = await buildHealthReport(orchestrator, pool, classifier);
      return textResult(`# Health: ${report.status}

- Active jobs: ${report.service.activeJobCount}
- Total jobs: ${report.service.totalJobCount}
- Pool: ${report.pool.mode}, ${report.pool.busy}/${report.pool.maxWorkers} busy, ${report.pool.pending} waiting
${report.classifier ? `- Classifier: ${report.classifier.reachable ? 'reachable' : 'unreachable'} (circuit ${report.classifier.circuitBreaker})\n` : ''}
\`\`\`json
${JSON.stringify(report, null, 2)}
\`\`\``);
    } catch (error) {
      return errorResult('Error checking health', error);
    }
  };
}

/**
 * Register the health-check tool
 */
export function registerHealthCheckTool(
  server: McpServer,
  orchestrator: JobOrchestrator,
  pool: IExecutionPool,
  classifier?: ClassifierProbe
): void {
  const handler = createHealthCheckHandler(orchestrator, pool, classifier);
  server.tool(
    'health-check',
    'Check the health of the service: job counts, execution pool and classifier connectivity',
    {},
    () => handler()
  );
}
