import { EventEmitter } from 'node:events';
import config from 'config';
import pino from 'pino';
import metrics from './metrics/index.js';

type LevelListener = (level: string, previous: string) => void;

const LEVELS = Object.keys(pino.levels.values).sort();

const levelChanges = new EventEmitter();

function setting(key: string, fallback: string): string {
  return config.has(key) ? config.get<string>(key) : fallback;
}

function firstMessage(args: readonly unknown[]): string | undefined {
  for (const value of args) {
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
    if (value instanceof Error) {
      return value.message;
    }
  }
  return undefined;
}

const logger = pino({
  name: setting('app.name', 'cluster-event-filters'),
  level: setting('logging.level', 'info'),
  hooks: {
    logMethod(args, method, level) {
      metrics.incrementLogLevel(pino.levels.labels[level] ?? String(level), {
        message: firstMessage(args)
      });
      return method.apply(this, args);
    }
  }
});

export function getLogLevel(): string {
  return logger.level;
}

/**
 * Switches the level at runtime. Names are case-insensitive; an unknown name
 * throws and leaves the level unchanged.
 */
export function setLogLevel(next: string): string {
  const level = next.trim().toLowerCase();
  if (!LEVELS.includes(level)) {
    throw new Error(`Unknown log level "${level}" (available: ${LEVELS.join(', ')})`);
  }
  const previous = logger.level;
  if (previous !== level) {
    logger.level = level;
    levelChanges.emit('change', level, previous);
    logger.info({ level, previous }, 'Log level updated');
  }
  return level;
}

export function onLogLevelChange(listener: LevelListener): () => void {
  levelChanges.on('change', listener);
  return () => {
    levelChanges.off('change', listener);
  };
}

export default logger;
