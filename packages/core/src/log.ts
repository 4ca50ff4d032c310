/**
 * Tagged debug logging. Silent unless TINYTASK_DEBUG is set; writes to stderr
 * so command output stays clean.
 */

export type Logger = (...args: unknown[]) => void;

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env['TINYTASK_DEBUG'];
  return value !== undefined && value !== '' && value !== '0';
}

export function createLogger(tag: string): Logger {
  return (...args) => {
    if (!isDebugEnabled()) return;
    console.error(`[${tag}]:`, ...args);
  };
}
