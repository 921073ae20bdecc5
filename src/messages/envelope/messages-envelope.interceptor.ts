import { CallHandler, ExecutionContext, Injectable, Logger, NestInterceptor } from '@nestjs/common';
import { Observable, of, throwError } from 'rxjs';
import { catchError, map } from 'rxjs/operators';
import { renderError, renderSuccess, type ApiEnvelope } from './api-envelope';

/**
 * Wraps handler results in the API envelope and renders parameter and
 * not-found errors in-band with HTTP 200. Other errors pass through to
 * Nest's exception handling untouched.
 */
@Injectable()
export class MessagesEnvelopeInterceptor implements NestInterceptor<unknown, ApiEnvelope> {
  private readonly logger = new Logger(MessagesEnvelopeInterceptor.name);

  intercept(_context: ExecutionContext, next: CallHandler<unknown>): Observable<ApiEnvelope> {
    const startedAt = Date.now();
    const elapsed = (): number => (Date.now() - startedAt) / 1000;

    return next.handle().pipe(
      map((data) => renderSuccess(data, elapsed())),
      catchError((error: unknown) => {
        const envelope = renderError(error, elapsed());
        if (!envelope) {
          return throwError(() => error);
        }

        this.logger.debug(`Request rejected (${envelope.status}): ${JSON.stringify(envelope.data)}`);
        return of(envelope);
      }),
    );
  }
}
