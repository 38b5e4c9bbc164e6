/**
 * Dashboard Server - Hono app over @hono/node-server
 */

import { serve, type ServerType } from '@hono/node-server';
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { AdaptiveEngine } from '../engine.js';
import { createEngineLogger, type EngineLogger } from '../logging/index.js';
import { setupRoutes } from './routes.js';

export interface DashboardConfig {
  port: number;
  host: string;
  basePath: string;
  corsOrigins: string[];
}

export const DEFAULT_DASHBOARD_CONFIG: DashboardConfig = {
  port: 3001,
  host: '0.0.0.0',
  basePath: '',
  corsOrigins: ['http://localhost:3000', 'http://localhost:3001'],
};

export class DashboardServer<V = unknown> {
  private readonly app: Hono;
  private server: ServerType | null = null;
  private readonly config: DashboardConfig;
  private readonly logger: EngineLogger;

  constructor(engine: AdaptiveEngine<V>, config: Partial<DashboardConfig> = {}) {
    this.config = { ...DEFAULT_DASHBOARD_CONFIG, ...config };
    this.logger = createEngineLogger('info', { component: 'dashboard' });

    this.app = new Hono({ strict: false });
    this.app.use('*', cors({
      origin: this.config.corsOrigins,
      allowMethods: ['GET', 'POST'],
      allowHeaders: ['Content-Type', 'Authorization'],
    }));
    this.app.route(this.config.basePath || '/', setupRoutes(engine));
  }

  /**
   * Start listening. Resolves once the port is bound.
   */
  async start(): Promise<void> {
    if (this.server) return;

    await new Promise<void>((resolve) => {
      this.server = serve({
        fetch: this.app.fetch,
        port: this.config.port,
        hostname: this.config.host,
      }, () => resolve());
    });

    this.logger.info(`Dashboard running at ${this.getURL()}`);
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    server.close();
    this.logger.info('Dashboard stopped');
  }

  /**
   * The Hono app, for in-process requests.
   */
  getApp(): Hono {
    return this.app;
  }

  getURL(): string {
    return `http://${this.config.host}:${this.config.port}${this.config.basePath}`;
  }
}

export async function startDashboard<V>(
  engine: AdaptiveEngine<V>,
  config?: Partial<DashboardConfig>
): Promise<DashboardServer<V>> {
  const server = new DashboardServer(engine, config);
  await server.start();
  return server;
}
