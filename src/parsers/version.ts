// Leading digit run followed by at least one ".digits" group; anything may follow.
const VERSION_PATTERN = /^\d+(\.\d+)+/;

/**
 * Decides whether a whitespace-delimited token is a version string.
 * Both the inventory and the upgrade parsers classify tokens through this
 * function, so the two listings always agree on where versions are.
 */
export function looksLikeVersion(token: string): boolean {
  return VERSION_PATTERN.test(token);
}
