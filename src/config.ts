/**
 * Process-wide configuration, fixed at load time.
 *
 * Version aggregation and selector resolution read these values; nothing
 * writes them after startup.
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export interface RxTreeConfig {
  /** Oldest host-interpreter version any construct is assumed to need. */
  readonly minimumHostVersion: number;
  /** Prefix that qualifies the kind names accepted by find(). */
  readonly namespace: string;
  readonly logLevel: LogLevel;
}

const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function resolveLogLevel(env: NodeJS.ProcessEnv): LogLevel {
  const explicit = env.RXTREE_LOG_LEVEL;
  if (explicit && isLogLevel(explicit)) return explicit;
  if (env.NODE_ENV === 'test') return 'silent';
  return 'warn';
}

export const config: RxTreeConfig = Object.freeze({
  minimumHostVersion: 5.006,
  namespace: 'Rx::',
  logLevel: resolveLogLevel(process.env),
});
