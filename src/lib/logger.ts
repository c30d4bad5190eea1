import { getRequestContext } from './requestContext';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_WEIGHT: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function isLevelName(value: string): value is keyof typeof LEVEL_WEIGHT {
  return Object.prototype.hasOwnProperty.call(LEVEL_WEIGHT, value);
}

function threshold(): number {
  const configured = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return isLevelName(configured) ? LEVEL_WEIGHT[configured] : LEVEL_WEIGHT.info;
}

/**
 * Writes one JSON line per event. Request id and actor are attached when called inside a request.
 */
export function logEvent(level: LogLevel, event: string, fields: Record<string, unknown> = {}) {
  if (LEVEL_WEIGHT[level] < threshold()) return;
  const context = getRequestContext();
  const entry = {
    event,
    level,
    requestId: context?.requestId,
    actor: context?.actor,
    ...fields,
    timestamp: new Date().toISOString()
  };
  const line = JSON.stringify(entry);
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function serializeError(error: unknown) {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { message: String(error) };
}
