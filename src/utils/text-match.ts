/**
 * Case-insensitive substring test shared by sender, subject and body conditions.
 */
export function containsIgnoreCase(haystack: string, needle: string): boolean {
  return haystack.toLowerCase().includes(needle.toLowerCase());
}

export function equalsIgnoreCase(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/**
 * Checks that an address belongs to a domain: `user@EXAMPLE.com` matches
 * `example.com`, `user@notexample.com` does not.
 */
export function hasDomain(address: string, domain: string): boolean {
  return address.toLowerCase().endsWith(`@${domain.toLowerCase()}`);
}
