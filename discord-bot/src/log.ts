const warned = new Set<string>();

/**
 * Logs a warning the first time `key` is seen in this process. Engines use it
 * for configuration problems that would otherwise repeat every tick.
 */
export function warnOnce(key: string, message: string, context?: Record<string, unknown>): boolean {
  if (warned.has(key)) return false;
  warned.add(key);
  if (context) console.warn(message, context);
  else console.warn(message);
  return true;
}

export function resetWarnings() {
  warned.clear();
}
