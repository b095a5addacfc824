import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';

export interface WrappedResponse<T> {
  success: true;
  data: T;
  timestamp: string;
}

/** Wraps handler results in the `{ success, data, timestamp }` envelope. */
@Injectable()
export class ResponseWrapperInterceptor<T>
  implements NestInterceptor<T, WrappedResponse<T> | undefined>
{
  intercept(
    _context: ExecutionContext,
    next: CallHandler<T>,
  ): Observable<WrappedResponse<T> | undefined> {
    return next.handle().pipe(
      map((data) =>
        // 204 handlers return nothing and must stay bodiless
        data === undefined
          ? undefined
          : { success: true as const, data, timestamp: new Date().toISOString() },
      ),
    );
  }
}
