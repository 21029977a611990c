export const MAX_BACKOFF_FACTOR = 10;

/**
 * Delay before the next heartbeat: nominal after a success, doubling per
 * consecutive failure, capped at `maxFactor` times the nominal interval.
 */
export const heartbeatDelayMs = (
  intervalMs: number,
  consecutiveFailures: number,
  maxFactor = MAX_BACKOFF_FACTOR,
): number => {
  const nominal = Math.max(1, Math.trunc(intervalMs));
  if (consecutiveFailures <= 0) return nominal;
  const exponent = Math.min(consecutiveFailures, 30);
  return Math.min(nominal * 2 ** exponent, nominal * maxFactor);
};
