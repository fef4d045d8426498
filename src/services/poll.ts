/**
 * Bounded polling for hardware state that settles asynchronously
 */

export interface PollOptions {
  // Total budget across all attempts
  timeoutMs: number
  // Fixed delay between attempts
  intervalMs: number
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

/**
 * Run `check` until it reports true or the budget runs out.
 * Always checks at least once. Exhausting the budget resolves false;
 * errors thrown by `check` propagate.
 */
export async function pollUntil(check: () => Promise<boolean>, opts: PollOptions): Promise<boolean> {
  const deadline = Date.now() + opts.timeoutMs
  for (;;) {
    if (await check()) return true
    if (Date.now() + opts.intervalMs > deadline) return false
    await sleep(opts.intervalMs)
  }
}
