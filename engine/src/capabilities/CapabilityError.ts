/**
 * Error kinds reported by model and tool capabilities
 */
export type CapabilityErrorKind =
  | 'auth'
  | 'not_found'
  | 'rate_limited'
  | 'invalid_args'
  | 'upstream_failure'
  | 'timeout';

/**
 * Thrown by a capability to report a classified failure.
 * The invoker maps the kind onto the node's failure outcome.
 */
export class CapabilityError extends Error {
  constructor(
    public readonly kind: CapabilityErrorKind,
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'CapabilityError';
  }
}
