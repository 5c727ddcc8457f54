import { isEngineError } from '../core';
import type { EngineWarning } from '../core';
import { createLogger } from '../utils';
import type { ApiResult } from './types';

const log = createLogger('envelope');

/** Wraps an engine call in the `{ success, data, warnings } | { success, error }` shape. */
export async function toApiResult<T extends { warnings: EngineWarning[] }>(
  call: () => Promise<T>,
): Promise<ApiResult<T>> {
  try {
    const data = await call();
    return { success: true, data, warnings: data.warnings };
  } catch (err) {
    if (isEngineError(err)) {
      return { success: false, error: { kind: err.kind, message: err.message, ...err.details() } };
    }
    log.error('Unexpected engine failure', { error: err });
    return {
      success: false,
      error: { kind: 'internal', message: err instanceof Error ? err.message : String(err) },
    };
  }
}
