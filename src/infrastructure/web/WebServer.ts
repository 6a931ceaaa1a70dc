import express, { Express, NextFunction, Request, Response } from 'express';
import { Server as HttpServer } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import cors from 'cors';
import { z } from 'zod';
import { JOB_STATUSES, JobUpdateEvent } from '../../core/entities/ClassificationJob.js';
import { JobServiceError, InvalidJobStateError, errorMessage } from '../../core/errors.js';
import type { JobOrchestrator } from '../../application/services/JobOrchestrator.js';
import { createLogger } from '../logging/logger.js';

const logger = createLogger('WebServer');

const REQUIRED = 'Items and categories required';

const BatchRequestSchema = z.object(
  {
    items: z.array(z.string({ invalid_type_error: 'Every item must be a non-empty string' }), {
      required_error: REQUIRED,
      invalid_type_error: REQUIRED,
    }),
    categories: z.array(z.string({ invalid_type_error: 'Every category must be a non-empty string' }), {
      required_error: REQUIRED,
      invalid_type_error: REQUIRED,
    }),
  },
  { invalid_type_error: 'Request body must be a JSON object' }
);

const StatusFilterSchema = z.enum(JOB_STATUSES).optional();

export type WebSocketMessage =
  | { type: 'connected'; timestamp: string }
  | { type: 'job_updated'; jobId: string; status: string; timestamp: string };

export interface WebServerOptions {
  host?: string;
  port?: number;
}

/**
 * HTTP and WebSocket surface over the orchestrator
 */
export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;
  private wss: WebSocketServer | null = null;
  private clients: Set<WebSocket> = new Set();
  private unsubscribe: (() => void) | null = null;
  private host: string;
  private port: number;

  constructor(
    private orchestrator: JobOrchestrator,
    options: WebServerOptions = {}
  ) {
    this.host = options.host ?? '0.0.0.0';
    this.port = options.port ?? 8000;
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.app.use(this.handleError);
  }

  /**
   * The Express application, for in-process requests
   */
  get handler(): Express {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json({ limit: '5mb' }));
  }

  private setupRoutes(): void {
    this.app.post('/classify/batch', (req: Request, res: Response) => {
      const parsed = BatchRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: parsed.error.issues[0]?.message ?? REQUIRED });
        return;
      }

      const receipt = this.orchestrator.submit(parsed.data);
      res.status(202).json(receipt);
    });

    this.app.get('/jobs', (req: Request, res: Response) => {
      const status = StatusFilterSchema.safeParse(req.query.status);
      if (!status.success) {
        res.status(400).json({ error: `Unknown status filter; expected one of ${JOB_STATUSES.join(', ')}` });
        return;
      }

      res.json({ jobs: this.orchestrator.list(status.data) });
    });

    this.app.get('/jobs/:id', (req: Request, res: Response) => {
      res.json(this.orchestrator.query(req.params.id));
    });

    this.app.get('/jobs/:id/results', (req: Request, res: Response) => {
      res.json(this.orchestrator.results(req.params.id));
    });

    this.app.get('/jobs/:id/log', (req: Request, res: Response) => {
      res.json(this.orchestrator.log(req.params.id));
    });

    this.app.post('/jobs/:id/cancel', (req: Request, res: Response) => {
      res.json(this.orchestrator.cancel(req.params.id));
    });

    this.app.get('/health', (_req: Request, res: Response) => {
      res.json(this.orchestrator.health());
    });
  }

  private handleError = (error: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (error instanceof InvalidJobStateError) {
      res.status(error.httpStatus).json({ error: error.message, status: error.status });
      return;
    }
    if (error instanceof JobServiceError) {
      res.status(error.httpStatus).json({ error: error.message });
      return;
    }

    const clientStatus = clientErrorStatus(error);
    if (clientStatus === 400) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    if (clientStatus !== undefined) {
      res.status(clientStatus).json({ error: errorMessage(error) });
      return;
    }

    logger.error(`${req.method} ${req.path} failed: ${errorMessage(error)}`);
    res.status(500).json({ error: 'Internal server error' });
  };

  private setupWebSocket(): void {
    if (!this.httpServer) return;

    this.wss = new WebSocketServer({ server: this.httpServer, path: '/ws' });

    this.wss.on('connection', (ws: WebSocket) => {
      logger.debug('WebSocket client connected');
      this.clients.add(ws);

      ws.on('close', () => {
        logger.debug('WebSocket client disconnected');
        this.clients.delete(ws);
      });

      ws.on('error', (error) => {
        logger.warn(`WebSocket error: ${error.message}`);
        this.clients.delete(ws);
      });

      this.send(ws, { type: 'connected', timestamp: new Date().toISOString() });
    });

    this.unsubscribe = this.orchestrator.onJobUpdate((event) => this.notifyJobUpdate(event));
  }

  broadcast(message: WebSocketMessage): void {
    for (const client of this.clients) {
      this.send(client, message);
    }
  }

  notifyJobUpdate(event: JobUpdateEvent): void {
    this.broadcast({
      type: 'job_updated',
      jobId: event.jobId,
      status: event.status,
      timestamp: event.timestamp.toISOString(),
    });
  }

  /**
   * Port actually bound (differs from the configured one when that was 0)
   */
  boundPort(): number | undefined {
    const address = this.httpServer?.address();
    if (!address || typeof address === 'string') return undefined;
    return address.port;
  }

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, this.host, () => {
        logger.info(`Listening on http://${this.host}:${this.boundPort() ?? this.port}`);
        this.setupWebSocket();
        resolve();
      });
      this.httpServer = server;

      server.on('error', (error) => {
        logger.error(`Server error: ${error.message}`);
        reject(error);
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      this.unsubscribe?.();
      this.unsubscribe = null;

      for (const client of this.clients) {
        client.close();
      }
      this.clients.clear();

      if (this.wss) {
        this.wss.close(() => {
          logger.debug('WebSocket server closed');
        });
        this.wss = null;
      }

      const server = this.httpServer;
      this.httpServer = null;
      if (server) {
        server.close(() => {
          logger.info('HTTP server closed');
          resolve();
        });
        server.closeAllConnections();
      } else {
        resolve();
      }
    });
  }

  private send(client: WebSocket, message: WebSocketMessage): void {
    if (client.readyState === WebSocket.OPEN) {
      client.send(JSON.stringify(message));
    }
  }
}

/**
 * Status of an HTTP error raised by the body parser (4xx), if any
 */
function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('status' in error)) return undefined;
  const { status } = error;
  if (typeof status === 'number' && status >= 400 && status < 500) return status;
  return undefined;
}
