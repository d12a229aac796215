import { randomUUID } from 'node:crypto';

/**
 * Vygeneruje unikátní ID pro pravidla.
 */
export function generateId(): string {
  return randomUUID();
}
