/* ------------------------------------------------------------------
   Tiny, dependency-free logger with five verbosity levels
   ------------------------------------------------------------------ */
export type Verbosity = 0 | 1 | 2 | 3 | 4;  // 0 = errors only … 4 = trace

export interface Logger {
  level : Verbosity;
  log(lvl: Verbosity, msg: string): void;
  /** Same level and sink, every line prefixed with `scope: ` */
  child(scope: string): Logger;
}

export function createLogger(
  level: Verbosity = 0,
  sink : (msg: string) => void = console.info,
  scope?: string,
): Logger {
  const prefix = scope ? `${scope}: ` : '';
  return {
    level,
    log(lvl, msg) {
      if (lvl <= level) sink(`${lvl}| ${prefix}${msg}`);
    },
    child(name) {
      return createLogger(level, sink, scope ? `${scope}.${name}` : name);
    },
  };
}

/** Level-0 logger for callers that pass none; only errors would print. */
export const silentLogger: Logger = createLogger(0, () => {});
