import pino from 'pino';

function defaultLevel(): string {
  const level = process.env['LOG_LEVEL'];
  if (level) return level;
  // Jest sets NODE_ENV=test; keep test output readable.
  return process.env['NODE_ENV'] === 'test' ? 'silent' : 'info';
}

// JSON lines on stderr, next to cargo's own diagnostics.
export const logger = pino(
  {
    name: 'screeps-wasm-build',
    level: defaultLevel(),
  },
  pino.destination(2)
);

export function enableVerbose(): void {
  logger.level = 'debug';
}
