export interface Logger {
  info(msg: string, extra?: unknown): void;
  debug(msg: string, extra?: unknown): void;
  warn(msg: string, extra?: unknown): void;
  error(msg: string, extra?: unknown): void;
}

function render(extra: unknown): unknown {
  if (extra === undefined) return '';
  if (extra instanceof Error) return extra;
  return JSON.stringify(extra);
}

/** Console logger that prefixes every line with `[tag]`. */
export function createLogger(tag: string): Logger {
  return {
    info: (msg, extra) => console.log(`[${tag}] ${msg}`, render(extra)),
    debug: (msg, extra) => console.debug(`[${tag}] ${msg}`, render(extra)),
    warn: (msg, extra) => console.warn(`[${tag}] ${msg}`, render(extra)),
    error: (msg, extra) => console.error(`[${tag}] ${msg}`, render(extra)),
  };
}
