// packages/node-runtime/src/program.ts
import { Command, CommanderError, Option } from 'commander';
import {
  Scheme,
  Version,
  createLogger,
  splitScheme,
  type Verbosity,
} from '../../core/src/index.js';

export const PKG_VERSION = '0.3.0'; // sync with root package.json

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

function clampVerbosity(n: number): Verbosity {
  if (n <= 0) return 0;
  if (n === 1) return 1;
  if (n === 2) return 2;
  if (n === 3) return 3;
  return 4;
}

export function createProgram(io: CliIO): Command {
  const program = new Command();

  program
    .name('protoscheme')
    .version(PKG_VERSION)
    .description('Inspect URI schemes and protocol version tags')
    .exitOverride()
    .configureOutput({
      writeOut: s => io.stdout(s),
      writeErr: s => io.stderr(s),
    })

    // verbosity (repeatable)
    .addOption(
      new Option('-v, --verbose', 'increase verbosity (use multiple times)')
        .default(0)
        .argParser((_, previous: number) => previous + 1)
    );

  const logger = () => {
    const opts = program.opts<{ verbose: number }>();
    return createLogger(clampVerbosity(opts.verbose), msg => io.stderr(`${msg}\n`), 'cli');
  };

  program
    .command('scan <uri>')
    .description('Locate the scheme prefix of a full URI')
    .action((uri: string) => {
      const { boundary, scheme, rest } = splitScheme(uri, logger());
      const out = {
        kind    : boundary.kind,
        scheme  : scheme?.asStr() ?? null,
        boundary: scheme ? scheme.length : null,
        rest    : new TextDecoder().decode(rest),
      };
      io.stdout(JSON.stringify(out, null, 2) + '\n');
    });

  program
    .command('parse <scheme>')
    .description('Validate a standalone scheme token')
    .action((text: string) => {
      const log    = logger();
      const scheme = Scheme.parse(text);
      log.log(3, `parsed ${scheme.isKnown() ? 'known' : 'generic'} scheme`);
      const out = {
        kind  : scheme.isKnown() ? 'standard' : 'other',
        scheme: scheme.asStr(),
        hash  : scheme.hashCode(),
      };
      io.stdout(JSON.stringify(out, null, 2) + '\n');
    });

  program
    .command('versions')
    .description('List the protocol versions of this build; * marks the default')
    .action(() => {
      const def = Version.default();
      for (const v of Version.values()) {
        io.stdout(`${v.equals(def) ? '*' : ' '} ${v.asStr()}\n`);
      }
    });

  return program;
}

/**
 * Run the CLI against `argv` (user arguments only) and resolve to the exit
 * code. Library errors are reported as `Error [Name]: message`.
 */
export async function run(argv: readonly string[], io: CliIO): Promise<number> {
  try {
    await createProgram(io).parseAsync([...argv], { from: 'user' });
    return 0;
  } catch (err) {
    // commander has already written its own message
    if (err instanceof CommanderError) return err.exitCode;
    if (err instanceof Error) {
      io.stderr(`Error [${err.constructor.name}]: ${err.message}\n`);
    } else {
      io.stderr(`Error [Unknown]: ${String(err)}\n`);
    }
    return 1;
  }
}
