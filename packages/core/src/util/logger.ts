/* ------------------------------------------------------------------
   Tiny leveled logger, five verbosity levels
   ------------------------------------------------------------------ */
export type Verbosity = 0 | 1 | 2 | 3 | 4;  // 0 = errors only … 4 = trace

export interface Logger {
  level : Verbosity;
  log(lvl: Verbosity, msg: string): void;
  /** Same sink and level, every line prefixed with `[scope]`. */
  child(scope: string): Logger;
}

export function createLogger(
  level: Verbosity = 0,
  sink : (msg: string) => void = console.info,
  scope?: string,
): Logger {
  const prefix = scope ? `[${scope}] ` : '';
  return {
    level,
    log(lvl, msg) {
      if (lvl <= this.level) sink(`${lvl}| ${prefix}${msg}`);
    },
    child(sub) {
      return createLogger(this.level, sink, scope ? `${scope}:${sub}` : sub);
    },
  };
}

export function toVerbosity(n: number): Verbosity {
  if (n <= 0) return 0;
  if (n >= 4) return 4;
  switch (Math.floor(n)) {
    case 1:  return 1;
    case 2:  return 2;
    default: return 3;
  }
}
