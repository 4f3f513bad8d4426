import { RequestHandler } from 'express';
import { collectDefaultMetrics, Counter, Histogram, Registry } from 'prom-client';

function routeLabel(route: unknown, baseUrl: string): string {
  if (typeof route === 'object' && route !== null && 'path' in route && typeof route.path === 'string') {
    return `${baseUrl}${route.path}`;
  }
  return 'unmatched';
}

/**
 * Prometheus metrics for one app instance, on its own registry so several
 * instances can live in one process.
 */
export class TripMetrics {
  readonly registry = new Registry();
  readonly requestsTotal: Counter<'method' | 'route' | 'status'>;
  readonly requestDuration: Histogram<'method' | 'route'>;
  readonly searchesTotal: Counter<'status'>;

  constructor(options: { collectDefaults?: boolean } = {}) {
    if (options.collectDefaults) {
      collectDefaultMetrics({ register: this.registry });
    }

    this.requestsTotal = new Counter({
      name: 'trip_requests_total',
      help: 'Total number of requests processed',
      labelNames: ['method', 'route', 'status'] as const,
      registers: [this.registry]
    });
    this.requestDuration = new Histogram({
      name: 'trip_request_duration_seconds',
      help: 'Duration of requests in seconds',
      labelNames: ['method', 'route'] as const,
      buckets: [0.05, 0.1, 0.5, 1, 2, 5],
      registers: [this.registry]
    });
    this.searchesTotal = new Counter({
      name: 'trip_searches_total',
      help: 'Trip searches by terminal status',
      labelNames: ['status'] as const,
      registers: [this.registry]
    });
  }

  middleware(): RequestHandler {
    return (req, res, next) => {
      const started = process.hrtime.bigint();
      res.on('finish', () => {
        const route = routeLabel(req.route, req.baseUrl);
        const seconds = Number(process.hrtime.bigint() - started) / 1e9;
        this.requestsTotal.inc({ method: req.method, route, status: String(res.statusCode) });
        this.requestDuration.observe({ method: req.method, route }, seconds);
      });
      next();
    };
  }

  recordSearch(status: 'completed' | 'failed'): void {
    this.searchesTotal.inc({ status });
  }

  async render(): Promise<{ contentType: string; body: string }> {
    return { contentType: this.registry.contentType, body: await this.registry.metrics() };
  }
}
