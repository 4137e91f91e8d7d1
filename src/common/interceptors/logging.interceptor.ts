import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import { FastifyReply, FastifyRequest } from 'fastify';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { appLogger } from '../utils/app-logger';

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const { method, url } = http.getRequest<FastifyRequest>();
    const now = Date.now();

    appLogger.debug(`→ ${method} ${url}`);

    return next.handle().pipe(
      tap(() => {
        const { statusCode } = http.getResponse<FastifyReply>();
        const delay = Date.now() - now;

        if (statusCode >= 400) {
          appLogger.error(`← ${method} ${url} ${statusCode} - ${delay}ms`);
        } else if (statusCode >= 300) {
          appLogger.warn(`← ${method} ${url} ${statusCode} - ${delay}ms`);
        } else {
          appLogger.debug(`← ${method} ${url} ${statusCode} - ${delay}ms`);
        }
      }),
    );
  }
}
