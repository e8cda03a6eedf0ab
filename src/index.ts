export * from './lib/limiter';
export * from './lib/rateLimit';
export * from './lib/tokenBucket';
export * from './lib/ip';
export * from './lib/keys';
export * from './lib/config';
export * from './lib/errors';
export * from './lib/logging';
export * from './lib/metrics';
export * from './lib/prometheus';
export * from './stores/expirableStore';
export type { RequestView, ResponseSink, IPLookup, DecisionResult, DecisionOutcome, LimitReachedHandler } from './types';
