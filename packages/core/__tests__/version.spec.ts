import { inspect } from 'node:util';
import { Version, resolveDefaultVersion } from '../src/version/Version.js';
import { ConfigurationError } from '../src/errors/index.js';

describe('Version', () => {
  it('renders canonical strings', () => {
    expect(Version.HTTP_09.asStr()).toBe('HTTP/0.9');
    expect(Version.HTTP_10.asStr()).toBe('HTTP/1.0');
    expect(String(Version.HTTP_11)).toBe('HTTP/1.1');
    expect(Version.HTTP_2.asStr()).toBe('HTTP/2.0');
    expect(Version.HTTP_3.asStr()).toBe('HTTP/3.0');
    expect(Version.RTSP_1.asStr()).toBe('RTSP/1.0');
    expect(JSON.stringify([Version.HTTP_2])).toBe('["HTTP/2.0"]');
    expect(inspect(Version.HTTP_3)).toBe('HTTP/3.0');
  });

  it('orders members by declaration', () => {
    expect(Version.HTTP_10.compare(Version.HTTP_11)).toBe(-1);
    expect(Version.HTTP_2.compare(Version.HTTP_11)).toBe(1);
    expect(Version.HTTP_2.compare(Version.HTTP_2)).toBe(0);
    expect(Version.HTTP_2.isAtLeast(Version.HTTP_11)).toBe(true);
    expect(Version.HTTP_10.isAtLeast(Version.HTTP_11)).toBe(false);

    const sorted = [Version.RTSP_1, Version.HTTP_3, Version.HTTP_09]
      .sort((a, b) => a.compare(b))
      .map(v => v.asStr());
    expect(sorted).toEqual(['HTTP/0.9', 'HTTP/3.0', 'RTSP/1.0']);
  });

  it('compares and hashes by member', () => {
    expect(Version.HTTP_11.equals(Version.HTTP_11)).toBe(true);
    expect(Version.HTTP_11.equals(Version.HTTP_2)).toBe(false);
    expect(Version.HTTP_11.hashCode()).not.toBe(Version.HTTP_2.hashCode());
  });

  it('lists the members of the enabled families', () => {
    expect(Version.values().map(v => v.asStr())).toEqual([
      'HTTP/0.9', 'HTTP/1.0', 'HTTP/1.1', 'HTTP/2.0', 'HTTP/3.0', 'RTSP/1.0',
    ]);
    expect(Version.values(['rtsp'])).toEqual([Version.RTSP_1]);
    expect(Version.values([])).toEqual([]);
  });
});

describe('default version', () => {
  it('is HTTP/1.1 in this build', () => {
    expect(Version.default()).toBe(Version.HTTP_11);
  });

  it('follows the enabled families', () => {
    expect(resolveDefaultVersion(['http'])).toBe(Version.HTTP_11);
    expect(resolveDefaultVersion(['rtsp', 'http'])).toBe(Version.HTTP_11);
    expect(resolveDefaultVersion(['rtsp'])).toBe(Version.RTSP_1);
  });

  it('does not exist without a protocol family', () => {
    expect(() => resolveDefaultVersion([])).toThrow(ConfigurationError);
  });
});
