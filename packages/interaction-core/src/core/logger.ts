export type Logger = {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

export const consoleLogger: Logger = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args)
};

/**
 * Prefixes every line with `[tag]`. Debug output is dropped unless enabled,
 * since pointer moves would otherwise flood the console.
 */
export function createTaggedLogger(tag: string, base: Logger, debugEnabled = false): Logger {
  const prefix = `[${tag}]`;
  return {
    debug: (...args) => {
      if (debugEnabled) {
        base.debug(prefix, ...args);
      }
    },
    info: (...args) => base.info(prefix, ...args),
    warn: (...args) => base.warn(prefix, ...args),
    error: (...args) => base.error(prefix, ...args)
  };
}
