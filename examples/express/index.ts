import express from 'express';
import { createLimiter } from '../../src/lib/limiter';
import { rateLimit } from '../../src/lib/rateLimit';
import { loadLimiterOptionsFromEnv } from '../../src/lib/config';
import { createLogger } from '../../src/lib/logging';
import { MetricsCollector } from '../../src/lib/metrics';
import { prometheusMetrics } from '../../src/lib/prometheus';

const app = express();
const logger = createLogger({ level: 'info', fields: { service: 'ratebooth-example' } });
const metrics = new MetricsCollector();

// RATE_LIMIT_MAX etc. override these when set
const settings = loadLimiterOptionsFromEnv(process.env, {
  max: 2,
  burst: 5,
  ipLookup: { name: 'X-Forwarded-For', indexFromRight: 0 },
  methods: ['GET', 'POST'],
});

const limiter = createLimiter({ ...settings, logger, metrics });

// Per-key limits for API clients, plus a couple of known basic-auth principals
limiter
  .setHeader('X-Api-Key', ['key-a', 'key-b'])
  .setBasicAuthUsers(['alice', 'bob'])
  .setMessage('{"error":"Too Many Requests"}')
  .setMessageContentType('application/json');

app.use(prometheusMetrics({ path: '/metrics', collector: metrics, logger }));

app.use(
  rateLimit(limiter, {
    hooks: {
      onAllowed: ({ key, remaining }) => {
        logger.debug('Rate limit check passed', { key, remaining });
      },
      onBlocked: ({ key, req }) => {
        logger.warn('Request blocked', { key, path: req.path });
      },
      onError: ({ error }) => {
        logger.error('Rate limit error', { error: String(error) });
      },
    },
  }),
);

app.get('/time', (_req, res) => {
  res.json({ now: new Date().toISOString() });
});

app.get('/hello', (_req, res) => {
  res.type('text/plain').send('hello world');
});

// OPTIONS and other methods outside the limited set pass straight through
app.options('/hello', (_req, res) => {
  res.sendStatus(204);
});

const port = Number(process.env.PORT || 3000);
app.listen(port, () => {
  logger.info('Example app listening', { url: `http://localhost:${port}`, metrics: `http://localhost:${port}/metrics` });
});
