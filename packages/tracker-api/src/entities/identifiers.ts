const TEMPORARY_ID_PREFIX = 'tmp-';
const TEMPORARY_ID_REGEX = /^tmp-\d+$/;

/**
 * Temporary identifiers live in their own namespace, so telling them apart
 * from server identifiers is a string check.
 */
export function isTemporaryId(identifier: string | null | undefined): identifier is string {
  return typeof identifier === 'string' && TEMPORARY_ID_REGEX.test(identifier);
}

export class TemporaryIdAllocator {
  private counter = 0;

  next(): string {
    this.counter += 1;
    return `${TEMPORARY_ID_PREFIX}${this.counter}`;
  }
}
