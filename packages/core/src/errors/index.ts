const DISABLE_STACKTRACE : boolean = true;

export class UriError extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name  = new.target.name;
    if (DISABLE_STACKTRACE) this.stack = undefined;
  }
}

export type ErrorKind = 'InvalidScheme' | 'SchemeTooLong';

/** Value-level parse failure; `kind` lets callers branch without instanceof. */
export class InvalidUriError extends UriError {
  constructor(readonly kind: ErrorKind, message: string) {
    super(message);
  }
}

export class InvalidSchemeError extends InvalidUriError {
  constructor(message = 'invalid scheme') { super('InvalidScheme', message); }
}

export class SchemeTooLongError extends InvalidUriError {
  constructor(message = 'scheme too long') { super('SchemeTooLong', message); }
}

export class ConfigurationError   extends UriError {}
export class InvariantError       extends UriError {}
