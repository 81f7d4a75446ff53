import { createRequire } from 'node:module';
import pino from 'pino';
import type { Logger } from 'pino';

const require = createRequire(import.meta.url);

function resolveTransport() {
  if (process.env.NODE_ENV === 'production') return undefined;
  try {
    require.resolve('pino-pretty');
    return { target: 'pino-pretty', options: { translateTime: 'SYS:standard' } } as const;
  } catch {
    return undefined;
  }
}

export const createLogger = (level: string): Logger =>
  pino({
    level,
    base: undefined,
    transport: resolveTransport(),
  });
