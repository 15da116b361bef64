import pino from 'pino';

const redactPaths = [
  'api_key',
  'apiKey',
  'api_secret',
  'apiSecret',
  'secret_key',
  'secretKey',
  'authorization',
  'password',
  '*.api_key',
  '*.apiKey',
  '*.api_secret',
  '*.apiSecret',
  '*.secret_key',
  '*.secretKey',
  '*.authorization',
  '*.password',
];

export function createLogger(name: string, options?: { destination?: pino.DestinationStream; level?: string }): pino.Logger {
  return pino({
    name,
    level: options?.level ?? process.env.LOG_LEVEL ?? 'info',
    redact: {
      paths: redactPaths,
      censor: '[REDACTED]',
    },
  }, options?.destination);
}
