import { LoggerService } from '@nestjs/common';
import { appLogger } from './app-logger';

/**
 * Routes Nest's internal logging through the process-wide AppLogger
 */
export class NestAppLogger implements LoggerService {
  log(message: string, context?: string): void {
    appLogger.log(context ? `[${context}] ${message}` : message);
  }

  error(message: string, trace?: string, context?: string): void {
    const fullMessage = context ? `[${context}] ${message}` : message;
    if (trace) {
      appLogger.error(`${fullMessage}\n${trace}`);
    } else {
      appLogger.error(fullMessage);
    }
  }

  warn(message: string, context?: string): void {
    appLogger.warn(context ? `[${context}] ${message}` : message);
  }

  debug(message: string, context?: string): void {
    appLogger.debug(context ? `[${context}] ${message}` : message);
  }

  verbose(message: string, context?: string): void {
    appLogger.debug(context ? `[${context}] ${message}` : message);
  }
}
