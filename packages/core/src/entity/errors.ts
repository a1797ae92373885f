/**
 * Error taxonomy
 *
 * Every precondition failure is thrown before the first call into the entity
 * database, so a failed operation never leaves a partial entity behind.
 * Errors raised by collaborators are not wrapped.
 */

import type { FormatVersion } from './version.js';

export class DxfcraftError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Entity kind is not available in the active format version
 */
export class VersionError extends DxfcraftError {
  readonly kind: string;
  readonly required: FormatVersion;
  readonly actual: FormatVersion;

  constructor(kind: string, required: FormatVersion, actual: FormatVersion) {
    super(`${kind} requires DXF version ${required}+, active version is ${actual}`);
    this.kind = kind;
    this.required = required;
    this.actual = actual;
  }
}

/**
 * Malformed geometric input
 */
export class ValueError extends DxfcraftError {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`${field}: ${message}`);
    this.field = field;
  }
}

/**
 * An operation needs a collaborator the factory was built without
 */
export class ConfigurationError extends DxfcraftError {
  readonly collaborator: string;

  constructor(collaborator: string, operation: string) {
    super(`${operation}: no ${collaborator} configured`);
    this.collaborator = collaborator;
  }
}
