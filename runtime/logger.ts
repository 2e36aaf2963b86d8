/**
 * Logger used by the app and the price manager: `log` and `error`.
 * Messages carry a bracketed tag such as `[PRICES]` as their first word.
 */
export interface Logger {
  log(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/**
 * Create a logger writing to stdout / stderr with a timestamp and a source name
 * @param name - Name of the component that owns the logger
 * @returns Logger backed by the console
 */
export function createConsoleLogger(name: string): Logger {
  const prefix = () => `${new Date().toISOString()} [${name}]`;
  return {
    log: (...args: unknown[]) => console.log(prefix(), ...args),
    error: (...args: unknown[]) => console.error(prefix(), ...args),
  };
}
