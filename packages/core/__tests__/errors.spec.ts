import {
  ConfigurationError,
  InvalidSchemeError,
  InvalidUriError,
  SchemeTooLongError,
  UriError,
} from '../src/errors/index.js';

describe('error hierarchy', () => {
  it('InvalidSchemeError carries kind, name and default message', () => {
    const e = new InvalidSchemeError();
    expect(e).toBeInstanceOf(InvalidUriError);
    expect(e).toBeInstanceOf(UriError);
    expect(e.kind).toBe('InvalidScheme');
    expect(e.name).toBe('InvalidSchemeError');
    expect(e.message).toBe('invalid scheme');
  });

  it('SchemeTooLongError carries its kind', () => {
    const e = new SchemeTooLongError();
    expect(e.kind).toBe('SchemeTooLong');
    expect(e.message).toBe('scheme too long');
  });

  it('drops stack traces', () => {
    expect(new ConfigurationError('x').stack).toBeUndefined();
  });
});
