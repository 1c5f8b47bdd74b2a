/**
 * Domain-layer directory error.
 *
 * Thrown by the store, the patch merger, the policy resolver and the facade.
 * Carries no HTTP knowledge: the SCIM exception filter maps `kind` to a status
 * code and to the envelope of the dialect the request arrived on.
 */
export type DirectoryErrorKind =
  | 'NotFound'
  | 'Conflict'
  | 'MethodNotAllowed'
  | 'InvalidPatch'
  | 'InvalidValue'
  | 'InvalidConfig';

export class DirectoryError extends Error {
  public readonly kind: DirectoryErrorKind;

  constructor(kind: DirectoryErrorKind, detail: string) {
    super(detail);
    this.name = 'DirectoryError';
    this.kind = kind;
  }

  static notFound(resourceType: 'User' | 'Group', id: string): DirectoryError {
    return new DirectoryError('NotFound', `${resourceType} ${id} not found`);
  }
}

export function isDirectoryError(error: unknown): error is DirectoryError {
  return error instanceof DirectoryError;
}
