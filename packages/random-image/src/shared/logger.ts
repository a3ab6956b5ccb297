const PREFIX = '[RandomImage]';

/**
 * Console logger gated by the `enableLogging` flag.
 * Errors are always written; debug and warn output only when enabled.
 */
export class Logger {
  constructor(private readonly enabled: boolean = false) {}

  debug(message: string, ...context: unknown[]): void {
    if (!this.enabled) return;
    console.debug(PREFIX, message, ...context);
  }

  warn(message: string, ...context: unknown[]): void {
    if (!this.enabled) return;
    console.warn(PREFIX, message, ...context);
  }

  error(message: string, ...context: unknown[]): void {
    console.error(PREFIX, message, ...context);
  }
}
