import pino from 'pino';

// stdout carries rendered templates, so every log line goes to stderr.
const transport =
  process.stderr.isTTY || process.env.NODE_ENV === 'development'
    ? pino.transport({
        target: 'pino-pretty',
        options: { colorize: true, destination: 2 },
      })
    : pino.destination(2);

export const logger = pino({ level: process.env.LOG_LEVEL || 'info' }, transport);
