/**
 * Forwards aborts from a caller's signal to a controller owned by the
 * query. Returns the unlink function.
 */
export function linkAbortSignal(
  source: AbortSignal | undefined,
  target: AbortController,
): () => void {
  if (source === undefined) return () => {};
  if (source.aborted) {
    target.abort(source.reason);
    return () => {};
  }
  const onAbort = () => target.abort(source.reason);
  source.addEventListener("abort", onAbort, { once: true });
  return () => source.removeEventListener("abort", onAbort);
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
