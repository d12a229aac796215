const MULTIPLIERS: Record<string, number> = {
  'ms': 1,
  's': 1000,
  'm': 60 * 1000,
  'h': 60 * 60 * 1000,
  'd': 24 * 60 * 60 * 1000,
  'w': 7 * 24 * 60 * 60 * 1000
};

export const DURATION_RE = /^(\d+)(ms|s|m|h|d|w)$/;

/**
 * Parsuje duration string na milisekundy.
 * Podporované formáty: "30m", "4h", "2d", "1w" nebo číslo v ms.
 */
export function parseDuration(duration: string | number): number {
  if (typeof duration === 'number') return duration;

  const match = DURATION_RE.exec(duration);
  const value = match?.[1];
  const unit = match?.[2];
  if (value === undefined || unit === undefined) {
    throw new Error(`Invalid duration: ${duration}`);
  }

  const num = parseInt(value, 10);
  const multiplier = MULTIPLIERS[unit];

  if (multiplier === undefined) {
    throw new Error(`Unknown duration unit: ${unit}`);
  }

  return num * multiplier;
}

/**
 * Vrátí okamžik posunutý o danou dobu (použito pro snooze).
 */
export function addDuration(from: number, duration: string | number): number {
  return from + parseDuration(duration);
}
