/**
 * Debug logger
 * Only logs when DEBUG contains 'ed25519' or ED25519_DEBUG is set to 1/true
 */

export type DebugLogger = (message: string, data?: Record<string, unknown>) => void;

export function isDebugEnabled(): boolean {
  const debugEnv = process.env['DEBUG'];
  const edDebugEnv = process.env['ED25519_DEBUG'];
  return debugEnv?.includes('ed25519') === true || edDebugEnv === '1' || edDebugEnv === 'true';
}

/**
 * Create a logger whose lines carry a `[ed25519:<scope>]` prefix
 */
export function createDebugLogger(scope: string): DebugLogger {
  return (message, data) => {
    if (!isDebugEnabled()) {
      return;
    }
    const timestamp = new Date().toISOString();
    const prefix = `[${timestamp}] [ed25519:${scope}]`;
    if (data) {
      console.debug(`${prefix} ${message}`, data);
    } else {
      console.debug(`${prefix} ${message}`);
    }
  };
}
