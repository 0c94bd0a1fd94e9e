/*
  Minimal application logger. The service runs as a local background process,
  so plain console output (captured by whatever supervises it) is enough.
*/
let debugEnabled = false;

export function setDebugLogging(enabled: boolean) {
  debugEnabled = enabled;
}

export const logger = {
  debug: (...args: unknown[]) => {
    if (debugEnabled) console.log('[debug]', ...args);
  },
  info: (...args: unknown[]) => console.log('[info]', ...args),
  warn: (...args: unknown[]) => console.warn('[warn]', ...args),
  error: (...args: unknown[]) => console.error('[error]', ...args)
};
