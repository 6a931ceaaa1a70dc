import { McpServer as BaseMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { JobOrchestrator } from '../application/services/JobOrchestrator.js';
import { IExecutionPool } from '../core/interfaces/IExecutionPool.js';
import { createLogger } from '../infrastructure/logging/logger.js';
import { registerHealthCheckTool, ClassifierProbe } from './tools/HealthCheckTool.js';
import { registerJobManagementTools } from './tools/JobManagementTools.js';

const logger = createLogger('MCP');

export interface McpServerOptions {
  name: string;
  version: string;
  orchestrator: JobOrchestrator;
  pool: IExecutionPool;
  classifier?: ClassifierProbe;
}

/**
 * Exposes the job operations as MCP tools over stdio
 */
export class McpServer {
  private server: BaseMcpServer;
  private transport: StdioServerTransport | null = null;

  constructor(options: McpServerOptions) {
    this.server = new BaseMcpServer({
      name: options.name,
      version: options.version,
    });

    registerJobManagementTools(this.server, options.orchestrator);
    registerHealthCheckTool(this.server, options.orchestrator, options.pool, options.classifier);
  }

  async start(): Promise<void> {
    const transport = new StdioServerTransport();

    process.stdin.on('error', (error) => {
      logger.warn(`stdin error (non-fatal): ${error.message}`);
    });
    process.stdout.on('error', (error) => {
      logger.warn(`stdout error (non-fatal): ${error.message}`);
    });

    await this.server.connect(transport);
    this.transport = transport;
    logger.info('MCP server running on stdio');
  }

  async close(): Promise<void> {
    if (!this.transport) return;
    await this.server.close();
    this.transport = null;
    logger.info('MCP transport closed');
  }
}
