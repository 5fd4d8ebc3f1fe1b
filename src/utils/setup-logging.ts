const WRAP_FLAG = Symbol.for('volumeTracker.consoleTimestampWrapped');

type ConsoleMethod = 'log' | 'info' | 'warn' | 'error' | 'debug';

/**
 * Prefix every console line with an ISO timestamp. Safe to call repeatedly.
 */
export function installConsoleTimestamps(): void {
  if (Reflect.get(console, WRAP_FLAG) === true) {
    return;
  }

  const wrapMethod = (method: ConsoleMethod): void => {
    const original = console[method].bind(console);

    console[method] = (...args: unknown[]): void => {
      const timestamp = new Date().toISOString();
      const [first, ...rest] = args;

      if (args.length === 0) {
        original(`[${timestamp}]`);
      } else if (typeof first === 'string') {
        original(`[${timestamp}] ${first}`, ...rest);
      } else {
        original(`[${timestamp}]`, ...args);
      }
    };
  };

  const methods: ConsoleMethod[] = ['log', 'info', 'warn', 'error', 'debug'];
  methods.forEach(wrapMethod);

  Reflect.set(console, WRAP_FLAG, true);
}

installConsoleTimestamps();
