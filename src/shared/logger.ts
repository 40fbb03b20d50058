/**
 * The slice of the step logger that services depend on. The Motia context
 * logger satisfies it, so handlers pass `ctx.logger` straight through.
 */
export interface ServiceLogger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}
