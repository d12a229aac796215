const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Začátek kalendářního dne (lokální čas) pro daný okamžik.
 */
export function startOfDay(timestamp: number): number {
  const date = new Date(timestamp);
  date.setHours(0, 0, 0, 0);
  return date.getTime();
}

/**
 * Počet kalendářních dnů mezi dvěma okamžiky.
 *
 * Počítá se podle půlnocí, ne po 24 hodinách: zpráva z dnešního rána má
 * stáří 0, zpráva ze včerejšího večera stáří 1. Přechody letního času
 * se zaokrouhlí.
 */
export function calendarDaysBetween(from: number, to: number): number {
  return Math.round((startOfDay(to) - startOfDay(from)) / MS_PER_DAY);
}
