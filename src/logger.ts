/**
 * Optional logger interface for library users
 */
export interface StepLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Logger that prints "[prefix] message" through the console
 */
export function consoleLogger(prefix: string): StepLogger {
  return {
    info: (message: string) => console.log(`[${prefix}] ${message}`),
    warn: (message: string) => console.warn(`[${prefix}] ${message}`),
    error: (message: string) => console.error(`[${prefix}] ${message}`),
  };
}
