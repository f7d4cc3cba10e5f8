import pino from "pino";
import { inject, injectable } from "tsyringe";
import { TYPES } from "../../di/types";
import { ILogger, LogContext } from "./ILogger";

/**
 * Pino logger implementation
 */
@injectable()
export class PinoLogger implements ILogger {
  constructor(@inject(TYPES.PinoInstance) private readonly logger: pino.Logger) {}

  debug(message: string, context?: LogContext): void {
    this.logger.debug(context || {}, message);
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(context || {}, message);
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(context || {}, message);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.logger.error(
      {
        ...context,
        err: error,
      },
      message,
    );
  }

  fatal(message: string, error?: Error, context?: LogContext): void {
    this.logger.fatal(
      {
        ...context,
        err: error,
      },
      message,
    );
  }

  child(bindings: LogContext): ILogger {
    return new PinoLogger(this.logger.child(bindings));
  }
}
