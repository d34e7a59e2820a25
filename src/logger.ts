const RESET = '\x1b[0m';
const RED = '\x1b[31m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const CYAN = '\x1b[36m';

// Colour codes only mean something on a terminal
function isBrowser(): boolean {
  return Reflect.get(globalThis, 'window') !== undefined;
}

function colorize(text: string, color: string): string {
  return isBrowser() ? text : `${color}${text}${RESET}`;
}

function safeStringify(data: unknown): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(
    data,
    (_key: string, value: unknown) => {
      if (typeof value === 'bigint') {
        return value.toString();
      }
      if (typeof value === 'object' && value !== null) {
        if (seen.has(value)) {
          return '[Circular]';
        }
        seen.add(value);
      }
      return value;
    },
    2
  );
}

export function logWarning(message: string): void {
  console.log(colorize(message, YELLOW));
}

export function logInfo(message: string): void {
  console.log(colorize(message, GREEN));
}

/**
 * Logs a cyan `== title ==` header followed by the data. Objects are
 * pretty-printed as JSON with circular references replaced.
 */
export function logData(title: string, data?: unknown): void {
  console.log('');
  console.log(colorize(`== ${title} ==`, CYAN));

  if (data === undefined || data === null) {
    return;
  }
  console.log(typeof data === 'object' ? safeStringify(data) : data);
}

/**
 * Logs an error's stack (or message) in red, followed by its cause
 */
export function logError(error: unknown, title?: string): void {
  if (!(error instanceof Error)) {
    console.error(colorize(String(error), RED));
    return;
  }

  if (title) {
    console.log('');
    console.log(`== ${title} ==`);
  }
  console.log(colorize(error.stack ?? error.message, RED));

  const cause: unknown = error.cause;
  if (cause === undefined) {
    return;
  }
  console.log('');
  console.log(colorize('== Error Cause ==', RED));
  if (cause instanceof Error) {
    console.log(colorize(cause.stack ?? cause.message, RED));
  } else {
    console.log(colorize(safeStringify(cause), RED));
  }
}
