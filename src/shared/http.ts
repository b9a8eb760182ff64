export interface RequestSignal {
  signal: AbortSignal;
  /** True when the request was aborted by its own timeout rather than by the caller. */
  isTimeout(): boolean;
}

/**
 * Combine a per-request timeout with the caller's cancellation signal.
 */
export function requestSignal(timeoutMs: number, outer?: AbortSignal): RequestSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  const signal = outer ? AbortSignal.any([outer, timeout]) : timeout;
  return {
    signal,
    isTimeout: () => timeout.aborted && !(outer?.aborted ?? false),
  };
}
