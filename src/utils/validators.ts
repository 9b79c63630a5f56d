import { InvalidPackageIdError } from '../errors';

// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

/**
 * Identifiers go straight into the argv of a mutating command. Anything that
 * could be read as an option or split into several arguments is refused.
 */
export function isValidPackageId(id: string): boolean {
  if (!id) return false;
  if (id.startsWith('-')) return false;
  if (/\s/.test(id)) return false;
  return !CONTROL_CHARS.test(id);
}

export function validatePackageId(id: string): string {
  if (!isValidPackageId(id)) {
    throw new InvalidPackageIdError(id);
  }
  return id;
}
