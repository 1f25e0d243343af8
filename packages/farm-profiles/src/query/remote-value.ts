/**
 * RemoteValue helpers
 */

import type { RemoteValue } from '../core/types/query-service.js';

/**
 * Deferred value: nothing is evaluated until `resolve()` is called
 */
export function lazyRemoteValue<T>(evaluate: () => Promise<T | null>): RemoteValue<T> {
  return {
    resolve: () => evaluate(),
  };
}

/** Value already known locally */
export function resolvedRemoteValue<T>(value: T | null): RemoteValue<T> {
  return {
    resolve: () => Promise.resolve(value),
  };
}
