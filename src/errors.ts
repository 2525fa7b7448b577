/**
 * Error taxonomy for the chat proxy.
 *
 * Every failure a request can hit is one of these classes. Each carries the
 * HTTP status it is surfaced with and the `detail` string the caller sees.
 *
 * @packageDocumentation
 */

export type ChatErrorKind =
  | 'configuration'
  | 'upstream_transport'
  | 'upstream_rejection'
  | 'upstream_shape'
  | 'internal';

const PROCESSING_PREFIX = 'Error processing your request: ';

export abstract class ChatProxyError extends Error {
  abstract readonly kind: ChatErrorKind;
  readonly status: number;
  readonly detail: string;

  constructor(status: number, detail: string) {
    super(detail);
    this.name = new.target.name;
    this.status = status;
    this.detail = detail;
  }
}

/** The upstream credential is not configured. */
export class ConfigurationError extends ChatProxyError {
  readonly kind = 'configuration' as const;

  constructor(message = 'Google API Key not configured.') {
    super(500, message);
  }
}

/** Upstream answered with a non-2xx status; the status is passed through. */
export class UpstreamTransportError extends ChatProxyError {
  readonly kind = 'upstream_transport' as const;

  constructor(status: number, statusText: string, upstreamMessage: string) {
    super(status, `HTTP error occurred: ${[status, statusText].filter(Boolean).join(' ')} - ${upstreamMessage}`);
  }
}

/** Upstream refused the prompt before generating anything. */
export class UpstreamRejectionError extends ChatProxyError {
  readonly kind = 'upstream_rejection' as const;

  constructor(blockReason: string, safetyRatings?: unknown[]) {
    let message = `Prompt blocked due to ${blockReason}.`;
    if (safetyRatings !== undefined) {
      message += ` Safety Ratings: ${JSON.stringify(safetyRatings)}`;
    }
    super(500, PROCESSING_PREFIX + message);
  }
}

/** Upstream answered 2xx with a body we cannot interpret. */
export class UpstreamShapeError extends ChatProxyError {
  readonly kind = 'upstream_shape' as const;
  readonly payload: unknown;

  constructor(reason: string, payload: unknown) {
    super(500, PROCESSING_PREFIX + `${reason}: ${formatPayload(payload)}`);
    this.payload = payload;
  }
}

/** Anything else that went wrong while handling the request. */
export class InternalError extends ChatProxyError {
  readonly kind = 'internal' as const;

  constructor(cause: unknown) {
    super(500, PROCESSING_PREFIX + describeError(cause));
    this.cause = cause;
  }
}

export interface ErrorBody {
  detail: string;
}

export function toErrorBody(err: ChatProxyError): ErrorBody {
  return { detail: err.detail };
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    // fetch wraps socket failures; the cause says what actually happened
    if (err.cause instanceof Error) return `${err.message} (${err.cause.message})`;
    return err.message;
  }
  return String(err);
}

function formatPayload(payload: unknown): string {
  if (typeof payload === 'string') return payload;
  try {
    return JSON.stringify(payload);
  } catch {
    return String(payload);
  }
}
