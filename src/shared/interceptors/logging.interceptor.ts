import {
  CallHandler,
  ExecutionContext,
  Injectable,
  Logger,
  NestInterceptor,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger('HTTP');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const startedAt = Date.now();

    return next.handle().pipe(
      tap({
        next: () => {
          const response = http.getResponse<Response>();
          this.logger.log(
            `${request.method} ${request.originalUrl} ${response.statusCode} +${Date.now() - startedAt}ms`,
          );
        },
        error: (error: unknown) => {
          const reason = error instanceof Error ? error.name : String(error);
          this.logger.debug(
            `${request.method} ${request.originalUrl} failed (${reason}) +${Date.now() - startedAt}ms`,
          );
        },
      }),
    );
  }
}
