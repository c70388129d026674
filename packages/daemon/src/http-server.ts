/**
 * Optional status listener: Prometheus metrics and per-dataset health
 */

import { createServer } from 'node:http';
import type { IncomingMessage, Server, ServerResponse } from 'node:http';
import type { DatasetHealthRegistry } from './dataset-health.js';
import type { Logger } from './logger.js';
import type { Metrics } from './metrics.js';

export interface StatusServerConfig {
  host?: string;
  port?: number;
  metricsPath?: string;
  healthPath?: string;
}

export interface StatusResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export interface StatusDeps {
  metrics: Metrics;
  health: DatasetHealthRegistry;
}

const BASE_HEADERS = { 'X-Content-Type-Options': 'nosniff' };

/**
 * Route one request. Health is 200 while no dataset is backing off, else 503.
 */
export function handleStatusRequest(
  method: string,
  pathname: string,
  config: StatusServerConfig,
  deps: StatusDeps
): StatusResponse {
  const metricsPath = config.metricsPath ?? '/metrics';
  const healthPath = config.healthPath ?? '/healthz';

  if (method === 'GET' && pathname === metricsPath) {
    return {
      status: 200,
      headers: { ...BASE_HEADERS, 'Content-Type': 'text/plain; version=0.0.4; charset=utf-8' },
      body: deps.metrics.render(),
    };
  }

  if (method === 'GET' && pathname === healthPath) {
    const datasets = deps.health.list();
    const degraded = datasets.some((entry) => entry.state === 'backoff');
    return {
      status: degraded ? 503 : 200,
      headers: { ...BASE_HEADERS, 'Content-Type': 'application/json; charset=utf-8' },
      body: JSON.stringify({ status: degraded ? 'degraded' : 'ok', datasets }),
    };
  }

  return {
    status: 404,
    headers: { ...BASE_HEADERS, 'Content-Type': 'text/plain; charset=utf-8' },
    body: 'Not found',
  };
}

export async function startStatusServer(
  config: StatusServerConfig,
  deps: StatusDeps,
  logger: Logger
): Promise<Server> {
  const host = config.host ?? '127.0.0.1';
  const port = config.port ?? 9464;

  const requestHandler = (req: IncomingMessage, res: ServerResponse) => {
    const url = new URL(req.url ?? '/', `http://${host}:${port}`);
    const response = handleStatusRequest(req.method ?? 'GET', url.pathname, config, deps);
    res.writeHead(response.status, response.headers);
    res.end(response.body);
  };

  const httpServer = createServer(requestHandler);

  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(port, host, () => resolve());
  });

  logger.info('Status server started', {
    metrics: `http://${host}:${port}${config.metricsPath ?? '/metrics'}`,
    health: `http://${host}:${port}${config.healthPath ?? '/healthz'}`,
  });

  return httpServer;
}

export async function closeStatusServer(server: Server): Promise<void> {
  await new Promise<void>((resolve) => server.close(() => resolve()));
}
