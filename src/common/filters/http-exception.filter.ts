import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import { FastifyReply, FastifyRequest } from 'fastify';
import { ConfigService } from '@nestjs/config';
import { appLogger } from '../utils/app-logger';

interface ErrorResponseBody {
  error: string;
  message: string;
  statusCode: number;
  timestamp: string;
  path: string;
  details?: object;
  stack?: string;
}

function extractMessage(response: object, fallback: string): string {
  if ('message' in response) {
    const { message } = response;
    if (typeof message === 'string') {
      return message;
    }
    if (Array.isArray(message)) {
      return message.map(String).join(', ');
    }
  }
  if ('error' in response && typeof response.error === 'string') {
    return response.error;
  }
  return fallback;
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  constructor(private readonly configService: ConfigService) {}

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<FastifyReply>();
    const request = ctx.getRequest<FastifyRequest>();

    let status: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let message = 'Internal Server Error';
    let errorDetails: object | undefined;

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      const exceptionResponse = exception.getResponse();

      if (typeof exceptionResponse === 'string') {
        message = exceptionResponse;
      } else {
        message = extractMessage(exceptionResponse, message);
        errorDetails = exceptionResponse;
      }
    } else if (exception instanceof Error) {
      message = exception.message;
      appLogger.error(`Unhandled error: ${exception.message}`, exception.stack);
    }

    const isDevelopment = this.configService.get<string>('nodeEnv') === 'development';
    const isNotFound = status === HttpStatus.NOT_FOUND;

    if (!isNotFound || isDevelopment) {
      if (status >= 500) {
        appLogger.error(`${request.method} ${request.url} - ${status} - ${message}`);
      } else if (status >= 400) {
        appLogger.warn(`${request.method} ${request.url} - ${status} - ${message}`);
      }
    }

    const body: ErrorResponseBody = {
      error: isNotFound ? 'Not Found' : status >= 500 ? 'Internal Server Error' : 'Bad Request',
      message: isNotFound
        ? `Route ${request.method} ${request.url} not found`
        : isDevelopment || status < 500
          ? message
          : 'Something went wrong',
      statusCode: status,
      timestamp: new Date().toISOString(),
      path: request.url,
    };

    if (isDevelopment && !isNotFound) {
      if (errorDetails) {
        body.details = errorDetails;
      }
      if (exception instanceof Error && exception.stack) {
        body.stack = exception.stack;
      }
    }

    response.status(status).send(body);
  }
}
