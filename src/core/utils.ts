export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Poll `predicate` every `pollMs` until it resolves true or `timeoutMs` has
 * elapsed.  Resolves `false` on timeout; a throwing predicate rejects.
 */
export async function pollUntil(
  predicate: () => Promise<boolean>,
  timeoutMs: number,
  pollMs: number = 250,
): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;

  for (;;) {
    if (await predicate()) return true;
    if (Date.now() >= deadline) return false;
    await sleep(Math.min(pollMs, Math.max(0, deadline - Date.now())));
  }
}
