import type { Request, Response, NextFunction } from 'express';
import type { MetricsCollector } from './metrics';
import { silentLogger, type Logger } from './logging';

export interface PrometheusOptions {
  collector: MetricsCollector;
  path?: string;
  logger?: Logger;
}

export function prometheusMetrics(options: PrometheusOptions) {
  const { collector, path = '/metrics', logger = silentLogger } = options;

  return (req: Request, res: Response, next: NextFunction) => {
    if (req.path !== path) {
      next();
      return;
    }
    try {
      const metrics = collector.getPrometheusMetrics();

      res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
      res.setHeader('Cache-Control', 'no-cache, no-store, must-revalidate');
      res.status(200).send(metrics);
    } catch (error) {
      logger.error('Error generating Prometheus metrics', { error: String(error) });
      res.status(500).json({ error: 'Failed to generate metrics' });
    }
  };
}
