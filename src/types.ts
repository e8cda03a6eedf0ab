/**
 * Framework-independent view of an inbound request. Header names are
 * lower-case; each name maps to every occurrence of that header, in the
 * order the client sent them.
 */
export interface RequestView {
  method: string;
  path: string;
  remoteAddress?: string;
  headers: Readonly<Record<string, readonly string[] | undefined>>;
}

/** Where the limiter writes its headers and, on rejection, its response. */
export interface ResponseSink {
  setHeader(name: string, value: string): void;
  reject(statusCode: number, contentType: string, body: string): void;
}

export type IPLookup = {
  // 'RemoteAddr' or a header name such as 'X-Forwarded-For'
  name: string;
  indexFromRight: number;
};

export type DecisionOutcome = 'bypass-method' | 'bypass-identity' | 'admitted' | 'rejected';

export interface DecisionResult {
  admit: boolean;
  outcome: DecisionOutcome;
  headers: Array<[string, string]>;
  key?: string;
  remaining?: number;
}

export type LimitReachedHandler = (request: RequestView, sink: ResponseSink, result: DecisionResult) => void;
