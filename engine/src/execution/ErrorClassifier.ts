/**
 * Error Classifier
 *
 * Maps whatever a capability throws onto a NodeErrorKind. Nothing thrown
 * by a capability is allowed past the invoker; it always becomes a
 * classified failure outcome.
 */

import type { NodeErrorDetail, NodeErrorKind } from '../types/core-types.js';
import type { CapabilityErrorKind } from '../capabilities/CapabilityError.js';
import { CapabilityError } from '../capabilities/CapabilityError.js';
import { NodeInvocationError } from '../errors/RunErrors.js';
import { CancellationError, TimeoutError } from '../automation/TimeoutManager.js';

const CAPABILITY_KINDS: Readonly<Record<CapabilityErrorKind, NodeErrorKind>> = {
  auth: 'AuthFailure',
  not_found: 'NotFound',
  rate_limited: 'RateLimited',
  invalid_args: 'InvalidArgs',
  upstream_failure: 'UpstreamFailure',
  timeout: 'Timeout',
};

/**
 * Kind for an HTTP-style status code
 */
export function kindForStatus(status: number): NodeErrorKind {
  if (status === 401 || status === 403) return 'AuthFailure';
  if (status === 404) return 'NotFound';
  if (status === 408) return 'Timeout';
  if (status === 429) return 'RateLimited';
  if (status === 400 || status === 422) return 'InvalidArgs';
  return 'UpstreamFailure';
}

function statusOf(error: object): number | undefined {
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

export function classifyError(error: unknown): NodeErrorDetail {
  if (error instanceof NodeInvocationError) {
    return { kind: error.kind, message: error.message };
  }
  if (error instanceof CapabilityError) {
    return { kind: CAPABILITY_KINDS[error.kind], message: error.message };
  }
  if (error instanceof TimeoutError) {
    return { kind: 'Timeout', message: error.message };
  }
  if (error instanceof CancellationError || (error instanceof Error && error.name === 'AbortError')) {
    return { kind: 'Cancelled', message: error.message };
  }

  if (error instanceof Error) {
    const status = statusOf(error);
    if (status !== undefined) {
      return { kind: kindForStatus(status), message: error.message };
    }
    if (error.name === 'TimeoutError') {
      return { kind: 'Timeout', message: error.message };
    }
    return { kind: 'UpstreamFailure', message: error.message };
  }

  return { kind: 'UpstreamFailure', message: String(error) };
}

/**
 * Kinds that are never retried
 */
export function isRetryable(kind: NodeErrorKind): boolean {
  return kind !== 'Cancelled';
}
