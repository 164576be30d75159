/**
 * Debug logging to stderr, enabled with SPECTRACE_DEBUG=1 (or `true`).
 *
 * Format: `[ISO_TIMESTAMP] [SPECTRACE:category] message {json_data}`
 */

let enabledCache: boolean | null = null;

/**
 * Whether debug output is on. Resolved once per process.
 */
export function isDebugEnabled(): boolean {
  if (enabledCache === null) {
    const value = process.env.SPECTRACE_DEBUG;
    enabledCache = value === '1' || value === 'true';
  }
  return enabledCache;
}

/**
 * Write one debug line when debug mode is active.
 *
 * @param category - e.g. 'parse', 'build', 'metrics'
 * @param data - small structured payload appended as JSON
 */
export function debug(
  category: string,
  message: string,
  data?: Record<string, unknown>
): void {
  if (!isDebugEnabled()) return;

  let line = `[${new Date().toISOString()}] [SPECTRACE:${category}] ${message}`;
  if (data !== undefined) {
    line += ` ${JSON.stringify(data)}`;
  }
  process.stderr.write(line + '\n');
}

/**
 * Run `fn` and log how long it took. Calls `fn` directly when debug is off.
 */
export function debugTimed<T>(category: string, message: string, fn: () => T): T {
  if (!isDebugEnabled()) return fn();

  const start = performance.now();
  const result = fn();
  const duration = (performance.now() - start).toFixed(2);
  debug(category, `${message} (${duration}ms)`);
  return result;
}
