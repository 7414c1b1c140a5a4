/**
 * Derivation errors
 */

/**
 * A count invariant of the global configuration does not hold.
 *
 * Fatal: a derivation that throws this has no usable partial result, and the build must stop.
 */
export class ConfigInvariantError extends Error {
  constructor(
    readonly invariant: string,
    readonly expected: number,
    readonly actual: number,
  ) {
    super(`wrong number of ${invariant}, got ${actual}, expected ${expected}`);
    this.name = 'ConfigInvariantError';
  }
}

export function isConfigInvariantError(error: unknown): error is ConfigInvariantError {
  return error instanceof ConfigInvariantError;
}
