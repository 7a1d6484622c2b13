import http from 'http';
import type { DispatchStats } from '@hubrelay/core';

export interface HealthServerConfig {
  port: number;
  dispatcher: { getStats(): Readonly<DispatchStats> };
  /** Readiness probe; `/readyz` answers 503 while it returns false. */
  isReady?: () => boolean;
}

/**
 * Liveness on `/healthz` (alias `/health`) with dispatcher counters,
 * readiness on `/readyz`.
 */
export function createHealthServer(config: HealthServerConfig): http.Server {
  const startedAt = Date.now();
  const isReady = config.isReady ?? (() => true);

  const reply = (res: http.ServerResponse, status: number, body: Record<string, unknown>) => {
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(body));
  };

  const server = http.createServer((req, res) => {
    switch (req.url) {
      case '/healthz':
      case '/health':
        reply(res, 200, {
          status: 'ok',
          uptime: Math.floor((Date.now() - startedAt) / 1000),
          stats: config.dispatcher.getStats(),
        });
        return;
      case '/readyz': {
        const ready = isReady();
        reply(res, ready ? 200 : 503, { status: ready ? 'ready' : 'unavailable' });
        return;
      }
      default:
        res.writeHead(404);
        res.end();
    }
  });

  server.listen(config.port);
  return server;
}
