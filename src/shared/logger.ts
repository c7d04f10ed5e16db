import pino from 'pino';

const level = process.env['LOG_LEVEL'] ?? 'info';

// Logs go to stderr: `newsfold digest` writes its JSON result to stdout.
export const logger =
  process.env['NODE_ENV'] !== 'production'
    ? pino({
        level,
        transport: { target: 'pino-pretty', options: { colorize: true, destination: 2 } },
      })
    : pino({ level }, pino.destination(2));
