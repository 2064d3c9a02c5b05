import pino, { type LevelWithSilent } from 'pino';
import { env, type Env } from '../config/env.js';

/** Test runs are always silent; elsewhere LOG_LEVEL wins over the default. */
export function resolveLogLevel(config: Pick<Env, 'NODE_ENV' | 'LOG_LEVEL'>): LevelWithSilent {
  if (config.NODE_ENV === 'test') {
    return 'silent';
  }
  return config.LOG_LEVEL ?? 'info';
}

export const logger = pino({
  level: resolveLogLevel(env),
  base: { service: 'regadmin-server' },
  redact: {
    paths: [
      'accessToken',
      'refreshToken',
      'clientSecret',
      '*.accessToken',
      '*.refreshToken',
      '*.clientSecret',
      'req.headers.cookie',
      'req.headers.authorization',
    ],
    censor: '[redacted]',
  },
});
