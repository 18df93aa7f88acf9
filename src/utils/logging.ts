import pino, { type DestinationStream } from 'pino';
import { Writable } from 'stream';
import { loadConfig } from '../config/index.js';

let loggerInstance: pino.Logger | null = null;

function collectorLogger(level: string): { logger: pino.Logger; logs: string[] } {
  const logs: string[] = [];
  (globalThis as unknown as { __LOG_COLLECTOR__?: string[] }).__LOG_COLLECTOR__ = logs;
  const sink = new Writable({
    write(chunk, _enc, cb) {
      logs.push(chunk.toString());
      cb();
    },
  });
  return { logger: pino({ level, base: { service: 'resource-gateway' } }, sink as unknown as DestinationStream), logs };
}

export function getLogger() {
  if (!loggerInstance) {
    const cfg = loadConfig();
    if (process.env.TEST_LOG_COLLECTOR === '1') {
      loggerInstance = collectorLogger(cfg.logging.level).logger;
    } else {
      loggerInstance = pino({
        level: cfg.logging.level,
        base: { service: 'resource-gateway' },
        transport: cfg.logging.json ? undefined : { target: 'pino-pretty' },
      });
    }
  }
  return loggerInstance;
}

// Test-only helper to reset singleton (not exported in production docs)
export function __resetLoggerForTests() {
  loggerInstance = null;
}

// Force-enable in-memory log collection for tests regardless of env timing
export function __enableTestLogCollector() {
  const cfg = loadConfig();
  const { logger, logs } = collectorLogger(cfg.logging.level);
  loggerInstance = logger;
  return logs;
}
