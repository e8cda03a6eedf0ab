import { z } from 'zod';
import { ExpirableStore } from '../stores/expirableStore';
import type { DecisionResult, IPLookup, LimitReachedHandler, RequestView, ResponseSink } from '../types';
import { ipLookupSchema, parseLimiterOptions, validateSetting, type LimiterSettingsInput } from './config';
import { HttpError } from './errors';
import { headerValues, resolveAddress } from './ip';
import { buildKeyParts, joinKeyParts, type KeyComposerConfig } from './keys';
import { silentLogger, type Logger } from './logging';
import type { MetricsCollector } from './metrics';
import { createBucket, peekTokens, reconfigureBucket, RESET_AFTER_MS, tryConsume, type ConsumeResult, type TokenBucketState } from './tokenBucket';

export type LimiterOptions = LimiterSettingsInput & {
  now?: () => number;
  logger?: Logger;
  metrics?: MetricsCollector;
  onLimitReached?: LimitReachedHandler;
};

const rateSchema = z.number().positive();
const ttlSchema = z.number().int().positive();
const nameListSchema = z.array(z.string().min(1));

const RESET_SECONDS = String(RESET_AFTER_MS / 1000);

/**
 * Token-bucket admission control keyed by a composite request identity.
 *
 * Every decision runs to completion on the event loop without yielding, so
 * the lookup-refill-consume sequence for a key is atomic and setters are
 * never observed half-applied. Setters return the limiter for chaining.
 */
export class Limiter {
  private max: number;
  private burst: number | undefined;
  private methods: ReadonlySet<string> = new Set();
  private ipLookup: IPLookup;
  private message: string;
  private messageContentType: string;
  private statusCode: number;
  private ignoreURL: boolean;
  private ignoreAddress: boolean;
  private onLimitReached: LimitReachedHandler | undefined;

  private readonly buckets: ExpirableStore<string, TokenBucketState>;
  private readonly basicAuthUsers: ExpirableStore<string, true>;
  private readonly headers: ExpirableStore<string, ReadonlySet<string>>;

  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector | undefined;

  constructor(options: LimiterOptions) {
    const { now = Date.now, logger = silentLogger, metrics, onLimitReached, ...input } = options;
    const settings = parseLimiterOptions(input);

    this.now = now;
    this.logger = logger;
    this.metrics = metrics;
    this.max = settings.max;
    this.burst = settings.burst;
    this.ipLookup = settings.ipLookup;
    this.message = settings.message;
    this.messageContentType = settings.messageContentType;
    this.statusCode = settings.statusCode;
    this.ignoreURL = settings.ignoreURL;
    this.ignoreAddress = settings.ignoreAddress;
    this.onLimitReached = onLimitReached;

    const storeOptions = { cleanupIntervalMs: settings.cleanupIntervalMs, now };
    this.buckets = new ExpirableStore({ ...storeOptions, defaultTtlMs: settings.tokenBucketTtlMs });
    this.basicAuthUsers = new ExpirableStore({ ...storeOptions, defaultTtlMs: settings.basicAuthTtlMs });
    this.headers = new ExpirableStore({ ...storeOptions, defaultTtlMs: settings.headerEntryTtlMs });

    this.setMethods(settings.methods);
    this.setBasicAuthUsers(settings.basicAuthUsers);
    this.setHeaders(settings.headers);
    metrics?.trackBuckets(() => this.buckets.size);
  }

  // ---- decisions -------------------------------------------------------

  /** Decides whether `request` is admitted, without writing any response. */
  decide(request: RequestView): DecisionResult {
    const started = performance.now();
    const result = this.evaluate(request);
    this.metrics?.recordDecision(result.outcome, request.path, performance.now() - started);
    return result;
  }

  /**
   * Decides and writes the outcome to `sink`: rate-limit headers on both
   * outcomes, and on rejection either the configured handler or the
   * configured message and status.
   */
  handle(request: RequestView, sink: ResponseSink): DecisionResult {
    const result = this.decide(request);
    for (const [name, value] of result.headers) sink.setHeader(name, value);
    if (!result.admit) {
      if (this.onLimitReached) {
        this.onLimitReached(request, sink, result);
      } else {
        sink.reject(this.statusCode, this.messageContentType, this.message);
      }
    }
    return result;
  }

  /** Composite key for `request`, or undefined when it has no identity. */
  buildKey(request: RequestView): string | undefined {
    const address = this.ignoreAddress ? undefined : resolveAddress(request, this.ipLookup);
    const parts = buildKeyParts(request, address, this.composerConfig());
    return parts ? joinKeyParts(parts) : undefined;
  }

  /** Rate limits an arbitrary list of key parts; returns the rejection, if any. */
  limitByKeys(keys: readonly string[]): HttpError | undefined {
    const { allowed } = this.consume(joinKeyParts(keys));
    return allowed ? undefined : new HttpError(this.message, this.statusCode);
  }

  /** Consumes a token for `key`; true when none was available. */
  limitReached(key: string): boolean {
    return !this.consume(key).allowed;
  }

  /** Whole tokens currently available to `key`; a full bucket for unseen keys. */
  tokens(key: string): number {
    const bucket = this.buckets.get(key);
    if (!bucket) return Math.floor(this.capacity());
    return Math.min(peekTokens(bucket, this.now()), Math.floor(this.capacity()));
  }

  bucketCount(): number {
    return this.buckets.size;
  }

  /** Drops expired buckets and allow-list entries now instead of waiting for the sweep. */
  sweep(): number {
    return this.buckets.sweep() + this.basicAuthUsers.sweep() + this.headers.sweep();
  }

  stop(): void {
    this.buckets.stop();
    this.basicAuthUsers.stop();
    this.headers.stop();
  }

  private evaluate(request: RequestView): DecisionResult {
    const method = request.method.toUpperCase();
    if (this.methods.size > 0 && !this.methods.has(method)) {
      return { admit: true, outcome: 'bypass-method', headers: [] };
    }

    const key = this.buildKey(request);
    if (key === undefined) {
      this.logger.debug('Rate limit skipped: no identity', { method, path: request.path, lookup: this.ipLookup.name });
      return { admit: true, outcome: 'bypass-identity', headers: [] };
    }

    const { allowed, remaining } = this.consume(key);
    const headers: Array<[string, string]> = [
      // header fields are integers; X-Rate-Limit-Limit carries the exact rate
      ['RateLimit-Limit', String(Math.ceil(this.max))],
      ['RateLimit-Remaining', String(remaining)],
      ['RateLimit-Reset', RESET_SECONDS],
    ];
    if (allowed) {
      return { admit: true, outcome: 'admitted', headers, key, remaining };
    }

    headers.push(
      ['X-Rate-Limit-Limit', this.max.toFixed(2)],
      ['X-Rate-Limit-Duration', RESET_SECONDS],
      ['X-Rate-Limit-Request-Forwarded-For', (headerValues(request, 'x-forwarded-for') ?? []).join(', ')],
      ['X-Rate-Limit-Request-Remote-Addr', request.remoteAddress ?? ''],
    );
    this.logger.warn('Rate limit exceeded', { key, method, path: request.path });
    return { admit: false, outcome: 'rejected', headers, key, remaining };
  }

  private consume(key: string): ConsumeResult {
    const now = this.now();
    const capacity = this.capacity();
    const bucket = this.buckets.getOrCreate(key, () => createBucket(capacity, this.max, now));
    reconfigureBucket(bucket, capacity, this.max, now);
    return tryConsume(bucket, now);
  }

  private capacity(): number {
    return this.burst ?? Math.max(1, this.max);
  }

  private composerConfig(): KeyComposerConfig {
    return {
      ignoreAddress: this.ignoreAddress,
      ignoreURL: this.ignoreURL,
      methods: this.methods,
      isBasicAuthUser: (user) => this.basicAuthUsers.has(user),
      headers: this.headers.entries(),
    };
  }

  // ---- configuration ---------------------------------------------------

  setMax(max: number): this {
    this.max = validateSetting('max', rateSchema, max);
    this.logger.info('Rate limit max changed', { max: this.max });
    return this;
  }

  getMax(): number {
    return this.max;
  }

  /** Bucket capacity; `undefined` tracks `max` (at least 1). */
  setBurst(burst: number | undefined): this {
    this.burst = burst === undefined ? undefined : validateSetting('burst', rateSchema, burst);
    this.logger.info('Rate limit burst changed', { burst: this.capacity() });
    return this;
  }

  getBurst(): number {
    return this.capacity();
  }

  /** Only these methods are limited; an empty list limits every method. */
  setMethods(methods: readonly string[]): this {
    const validated = validateSetting('methods', nameListSchema, methods);
    this.methods = new Set(validated.map((method) => method.toUpperCase()));
    return this;
  }

  getMethods(): string[] {
    return [...this.methods];
  }

  /** Fields left out keep their current value. */
  setIPLookup(lookup: Partial<IPLookup>): this {
    this.ipLookup = validateSetting('ipLookup', ipLookupSchema, { ...this.ipLookup, ...lookup });
    this.logger.info('IP lookup changed', { ...this.ipLookup });
    return this;
  }

  getIPLookup(): IPLookup {
    return { ...this.ipLookup };
  }

  setBasicAuthUsers(users: readonly string[]): this {
    for (const user of validateSetting('basicAuthUsers', nameListSchema, users)) {
      this.basicAuthUsers.set(user, true);
    }
    return this;
  }

  removeBasicAuthUsers(users: readonly string[]): this {
    for (const user of users) this.basicAuthUsers.delete(user);
    return this;
  }

  getBasicAuthUsers(): string[] {
    return this.basicAuthUsers.keys();
  }

  /**
   * Limits by the given values of header `name`, merged with any already
   * registered. Registering a header with no values limits by every value.
   */
  setHeader(name: string, values: readonly string[] = []): this {
    const header = validateSetting('header', z.string().min(1), name).toLowerCase();
    const existing = this.headers.get(header) ?? new Set<string>();
    this.headers.set(header, new Set([...existing, ...values]));
    return this;
  }

  setHeaders(headers: Readonly<Record<string, readonly string[]>>): this {
    for (const [name, values] of Object.entries(headers)) this.setHeader(name, values);
    return this;
  }

  removeHeader(name: string): this {
    this.headers.delete(name.toLowerCase());
    return this;
  }

  /** Removes values from a header entry; an entry left with no values is removed. */
  removeHeaderEntries(name: string, values: readonly string[]): this {
    const header = name.toLowerCase();
    const existing = this.headers.get(header);
    if (!existing) return this;
    const remaining = new Set([...existing].filter((value) => !values.includes(value)));
    if (remaining.size === 0) {
      this.headers.delete(header);
    } else {
      this.headers.set(header, remaining);
    }
    return this;
  }

  getHeader(name: string): string[] | undefined {
    const values = this.headers.get(name.toLowerCase());
    return values ? [...values] : undefined;
  }

  getHeaders(): Record<string, string[]> {
    return Object.fromEntries(this.headers.entries().map(([name, values]) => [name, [...values]]));
  }

  setTokenBucketExpirationTTL(ttlMs: number): this {
    this.buckets.defaultTtlMs = validateSetting('tokenBucketTtlMs', ttlSchema, ttlMs);
    return this;
  }

  getTokenBucketExpirationTTL(): number {
    return this.buckets.defaultTtlMs;
  }

  setBasicAuthExpirationTTL(ttlMs: number): this {
    this.basicAuthUsers.defaultTtlMs = validateSetting('basicAuthTtlMs', ttlSchema, ttlMs);
    return this;
  }

  getBasicAuthExpirationTTL(): number {
    return this.basicAuthUsers.defaultTtlMs;
  }

  setHeaderEntryExpirationTTL(ttlMs: number): this {
    this.headers.defaultTtlMs = validateSetting('headerEntryTtlMs', ttlSchema, ttlMs);
    return this;
  }

  getHeaderEntryExpirationTTL(): number {
    return this.headers.defaultTtlMs;
  }

  setMessage(message: string): this {
    this.message = message;
    return this;
  }

  getMessage(): string {
    return this.message;
  }

  setMessageContentType(contentType: string): this {
    this.messageContentType = validateSetting('messageContentType', z.string().min(1), contentType);
    return this;
  }

  getMessageContentType(): string {
    return this.messageContentType;
  }

  setStatusCode(statusCode: number): this {
    this.statusCode = validateSetting('statusCode', z.number().int().min(400).max(599), statusCode);
    return this;
  }

  getStatusCode(): number {
    return this.statusCode;
  }

  setOnLimitReached(handler: LimitReachedHandler | undefined): this {
    this.onLimitReached = handler;
    return this;
  }

  getOnLimitReached(): LimitReachedHandler | undefined {
    return this.onLimitReached;
  }

  /** Leaves the request path out of the key, so one bucket spans all paths. */
  setIgnoreURL(ignore: boolean): this {
    this.ignoreURL = ignore;
    return this;
  }

  getIgnoreURL(): boolean {
    return this.ignoreURL;
  }

  /** Leaves the resolved address out of the key. */
  setIgnoreAddress(ignore: boolean): this {
    this.ignoreAddress = ignore;
    return this;
  }

  getIgnoreAddress(): boolean {
    return this.ignoreAddress;
  }
}

export function createLimiter(options: LimiterOptions): Limiter {
  return new Limiter(options);
}
