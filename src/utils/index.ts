export { generateId } from './id-generator.js';
export { parseDuration, addDuration } from './duration-parser.js';
export { startOfDay, calendarDaysBetween } from './calendar.js';
export { containsIgnoreCase, equalsIgnoreCase, hasDomain } from './text-match.js';
export { createScopedLogger } from './logger.js';
