/**
 * Namespaced console logger
 *
 * Debug output is off unless RENDER_DEBUG is "true", "1" or "*", or lists
 * the namespace (RENDER_DEBUG=render,server).
 */

type LogFn = (message: string, data?: Record<string, unknown>) => void;

export interface Logger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

function isDebugEnabled(namespace: string): boolean {
  const config = (process.env.RENDER_DEBUG ?? '').trim();
  if (!config || config === 'false' || config === '0') return false;
  if (config === 'true' || config === '1' || config === '*') return true;
  return config
    .split(',')
    .map((s) => s.trim())
    .includes(namespace);
}

function createLogFn(namespace: string, consoleFn: (...args: unknown[]) => void, debug = false): LogFn {
  const prefix = `[${namespace}]`;
  return (message, data) => {
    if (debug && !isDebugEnabled(namespace)) return;
    if (data !== undefined) {
      consoleFn(prefix, message, data);
    } else {
      consoleFn(prefix, message);
    }
  };
}

export function logger(namespace: string): Logger {
  return {
    debug: createLogFn(namespace, console.debug.bind(console), true),
    info: createLogFn(namespace, console.info.bind(console)),
    warn: createLogFn(namespace, console.warn.bind(console)),
    error: createLogFn(namespace, console.error.bind(console)),
  };
}
