import pino, { type Logger, type LevelWithSilent } from 'pino';

// stdout carries the MCP stdio transport, so logs go to stderr.
export function createLogger(level: LevelWithSilent = 'info'): Logger {
  return pino(
    {
      name: 'mem0-mcp',
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2),
  );
}
