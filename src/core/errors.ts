import type { ProviderName } from '../utils/config';
import type { Subject, TimeRange, UpstreamFailure, UpstreamReason } from './types';

export type EngineErrorKind = 'upstream' | 'source_unavailable' | 'invalid_interval' | 'invalid_request';

export abstract class EngineError extends Error {
  abstract readonly kind: EngineErrorKind;

  /** Extra fields surfaced in API error bodies. */
  details(): Record<string, unknown> {
    return {};
  }
}

export class UpstreamError extends EngineError {
  readonly kind = 'upstream';

  constructor(
    readonly provider: ProviderName,
    readonly reason: UpstreamReason,
    message: string,
    readonly window: TimeRange,
    readonly opts: { status?: number; timedOut?: boolean; cause?: unknown } = {},
  ) {
    super(`${provider}: ${message}`);
    this.name = 'UpstreamError';
  }

  get status(): number | undefined {
    return this.opts.status;
  }

  get timedOut(): boolean {
    return this.opts.timedOut ?? false;
  }

  get retryable(): boolean {
    return this.reason === 'transient' && !this.timedOut;
  }

  toFailure(): UpstreamFailure {
    return {
      provider: this.provider,
      reason: this.reason,
      message: this.message,
      window: this.window,
      timedOut: this.timedOut,
    };
  }

  details(): Record<string, unknown> {
    return { provider: this.provider, reason: this.reason, window: this.window, status: this.status };
  }
}

/** No configured provider could answer for the window. Never an empty result. */
export class SourceUnavailableError extends EngineError {
  readonly kind = 'source_unavailable';

  constructor(
    readonly subject: Subject,
    readonly window: TimeRange,
    readonly failures: UpstreamFailure[],
  ) {
    super(
      failures.length === 0
        ? `No providers configured for ${subject.kind} ${subject.address}`
        : `All providers failed for ${subject.kind} ${subject.address}: ${failures.map(f => `${f.provider}(${f.reason})`).join(', ')}`,
    );
    this.name = 'SourceUnavailableError';
  }

  details(): Record<string, unknown> {
    return { subject: this.subject, window: this.window, failures: this.failures };
  }
}

export class InvalidIntervalError extends EngineError {
  readonly kind = 'invalid_interval';

  constructor(
    readonly interval: string,
    readonly supported: readonly string[],
  ) {
    super(`Unsupported interval "${interval}" (supported: ${supported.join(', ')})`);
    this.name = 'InvalidIntervalError';
  }

  details(): Record<string, unknown> {
    return { interval: this.interval, supported: this.supported };
  }
}

export class InvalidRequestError extends EngineError {
  readonly kind = 'invalid_request';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidRequestError';
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}
