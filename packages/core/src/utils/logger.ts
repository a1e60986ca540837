const DIM = "\x1b[2m";
const CYAN = "\x1b[36m";
const RESET = "\x1b[0m";

let verbose = false;

export function setVerbose(v: boolean): void {
  verbose = v;
}

export function debug(...args: unknown[]): void {
  if (verbose) {
    console.error(`${DIM}[debug]${RESET}`, ...args);
  }
}

export function info(...args: unknown[]): void {
  console.error(...args);
}

export function error(...args: unknown[]): void {
  console.error("\x1b[31m[error]\x1b[0m", ...args);
}

export function warn(...args: unknown[]): void {
  console.error("\x1b[33m[warn]\x1b[0m", ...args);
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/** Logger that tags every line with the component it came from, e.g. `[watcher]`. */
export function createLogger(scope: string): Logger {
  const tag = `${CYAN}[${scope}]${RESET}`;
  return {
    debug: (...args) => debug(tag, ...args),
    info: (...args) => info(tag, ...args),
    warn: (...args) => warn(tag, ...args),
    error: (...args) => error(tag, ...args),
  };
}
