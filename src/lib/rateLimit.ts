import type { Request, Response, NextFunction } from 'express';
import type { DecisionResult, RequestView, ResponseSink } from '../types';
import type { Limiter } from './limiter';

export type RateLimitOptions = {
  hooks?: {
    onAllowed?: (info: { key: string; remaining: number; req: Request }) => void;
    onBlocked?: (info: { key: string; req: Request; result: DecisionResult }) => void;
    onBypassed?: (info: { reason: DecisionResult['outcome']; req: Request }) => void;
    onError?: (info: { error: unknown; req: Request }) => void;
  };
};

export function toRequestView(req: Request): RequestView {
  return {
    method: req.method,
    path: req.path,
    remoteAddress: req.socket.remoteAddress,
    headers: req.headersDistinct,
  };
}

export function expressResponseSink(res: Response): ResponseSink {
  return {
    setHeader(name, value) {
      res.setHeader(name, value);
    },
    reject(statusCode, contentType, body) {
      res.status(statusCode);
      res.setHeader('Content-Type', contentType);
      res.send(body);
    },
  };
}

/**
 * Express middleware gating the next handler on `limiter`. Rejected requests
 * are answered by the limiter (its message, or its limit-reached handler,
 * which must end the response).
 */
export function rateLimit(limiter: Limiter, options: RateLimitOptions = {}) {
  const { hooks } = options;

  return function rateLimitMiddleware(req: Request, res: Response, next: NextFunction) {
    let result: DecisionResult;
    try {
      result = limiter.handle(toRequestView(req), expressResponseSink(res));
    } catch (error) {
      hooks?.onError?.({ error, req });
      next(error);
      return;
    }

    const { key = '', remaining = 0 } = result;
    switch (result.outcome) {
      case 'rejected':
        hooks?.onBlocked?.({ key, req, result });
        return;
      case 'admitted':
        hooks?.onAllowed?.({ key, remaining, req });
        break;
      default:
        hooks?.onBypassed?.({ reason: result.outcome, req });
    }
    next();
  };
}
