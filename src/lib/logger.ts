interface LogFields {
  [key: string]: unknown;
}

type LogLevel = 'info' | 'warn' | 'error' | 'debug';

function serialize(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

function write(level: LogLevel, message: string, fields: LogFields = {}): void {
  const payload: LogFields = { level, message };
  for (const [key, value] of Object.entries(fields)) {
    payload[key] = serialize(value);
  }
  console.log(JSON.stringify(payload));
}

export function logInfo(message: string, fields?: LogFields): void {
  write('info', message, fields);
}

export function logWarn(message: string, fields?: LogFields): void {
  write('warn', message, fields);
}

export function logError(message: string, fields?: LogFields): void {
  write('error', message, fields);
}

export function logDebug(message: string, fields?: LogFields): void {
  write('debug', message, fields);
}
