import { run, Scheme } from '../src/index.js';
import { PKG_VERSION } from '../src/program.js';

/* ------------------------------------------------------------------ */
/*  In-process runner capturing both streams                           */
/* ------------------------------------------------------------------ */
async function cli(...args: string[]) {
  const out: string[] = [];
  const err: string[] = [];
  const code = await run(args, {
    stdout: t => { out.push(t); },
    stderr: t => { err.push(t); },
  });
  return { code, stdout: out.join(''), stderr: err.join('') };
}

describe('protoscheme (CLI)', () => {
  it('scan reports a generic scheme and the remainder', async () => {
    const r = await cli('scan', 'Foo+Bar://host/x');
    expect(r.code).toBe(0);
    expect(JSON.parse(r.stdout)).toEqual({
      kind: 'other',
      scheme: 'Foo+Bar',
      boundary: 7,
      rest: 'host/x',
    });
  });

  it('scan reports a known protocol in canonical form', async () => {
    const r = await cli('scan', 'HTTP://example.com');
    expect(JSON.parse(r.stdout)).toEqual({
      kind: 'standard',
      scheme: 'http',
      boundary: 4,
      rest: 'example.com',
    });
  });

  it('scan reports relative references', async () => {
    const r = await cli('scan', 'relative/path');
    expect(r.code).toBe(0);
    expect(JSON.parse(r.stdout)).toEqual({
      kind: 'none',
      scheme: null,
      boundary: null,
      rest: 'relative/path',
    });
  });

  it('parse prints kind, canonical text and hash', async () => {
    const r = await cli('parse', 'HTTPS');
    expect(JSON.parse(r.stdout)).toEqual({
      kind: 'standard',
      scheme: 'https',
      hash: Scheme.HTTPS.hashCode(),
    });
  });

  it('fails cleanly on an invalid scheme', async () => {
    const r = await cli('parse', 'a:b');
    expect(r.code).toBe(1);
    expect(r.stdout).toBe('');
    expect(r.stderr).toBe('Error [InvalidSchemeError]: invalid scheme\n');
  });

  it('fails cleanly on an over-long scheme', async () => {
    const r = await cli('scan', 'x'.repeat(65) + '://host');
    expect(r.code).toBe(1);
    expect(r.stderr).toBe('Error [SchemeTooLongError]: scheme too long\n');
  });

  it('versions lists the build members and marks the default', async () => {
    const r = await cli('versions');
    expect(r.stdout).toBe(
      '  HTTP/0.9\n' +
      '  HTTP/1.0\n' +
      '* HTTP/1.1\n' +
      '  HTTP/2.0\n' +
      '  HTTP/3.0\n' +
      '  RTSP/1.0\n',
    );
  });

  it('repeated -v raises log verbosity to stderr', async () => {
    const r = await cli('-v', '-v', '-v', '-v', 'scan', 'https://x');
    expect(r.code).toBe(0);
    expect(r.stderr).toBe('4| cli.split: known protocol https\n');

    const quiet = await cli('scan', 'https://x');
    expect(quiet.stderr).toBe('');
  });

  it('logs parse decisions at level 3', async () => {
    const r = await cli('-v', '-v', '-v', 'parse', 'coap');
    expect(r.stderr).toBe('3| cli: parsed generic scheme\n');
  });

  it('prints its version', async () => {
    const r = await cli('--version');
    expect(r.code).toBe(0);
    expect(r.stdout).toBe(`${PKG_VERSION}\n`);
  });

  it('rejects unknown commands with a non-zero code', async () => {
    const r = await cli('bogus');
    expect(r.code).toBe(1);
    expect(r.stderr).toMatch(/unknown command 'bogus'/);
  });
});
