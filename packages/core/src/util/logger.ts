/* ------------------------------------------------------------------
   Tiny, dependency-free logger with five verbosity levels
   ------------------------------------------------------------------ */
export type Verbosity = 0 | 1 | 2 | 3 | 4;  // 0 = errors only … 4 = trace

export interface Logger {
  level : Verbosity;
  log(lvl: Verbosity, msg: string): void;
}

export function createLogger(
  level: Verbosity = 0,
  sink : (msg: string) => void = console.info,
): Logger {
  return {
    level,
    log(lvl, msg) {
      if (lvl <= this.level) sink(`${lvl}| ${msg}`);
    },
  };
}

/** Logger that drops everything; default for state machines built without one. */
export const silentLogger: Logger = createLogger(0, () => {});

export function isVerbosity(n: number): n is Verbosity {
  return Number.isInteger(n) && n >= 0 && n <= 4;
}

/** Clamp an arbitrary count (e.g. repeated `-v` flags) into a verbosity level. */
export function toVerbosity(n: number): Verbosity {
  const clamped = Math.max(0, Math.min(4, Math.trunc(n)));
  return isVerbosity(clamped) ? clamped : 0;
}
