import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  Logger,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { Request } from 'express';
import { RequestContext } from '../request-context/request-context';

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger(LoggingInterceptor.name);

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>();
    const { method, url, body, query, params } = request;
    const prefix = `[${RequestContext.requestId() ?? '-'}]`;

    this.logger.debug(
      `${prefix} Request: ${method} ${url} \nBody: ${JSON.stringify(body)} \nQuery: ${JSON.stringify(query)} \nParams: ${JSON.stringify(params)}`,
    );

    const now = Date.now();
    return next.handle().pipe(
      tap(() => {
        this.logger.debug(`${prefix} Response: ${method} ${url} ${Date.now() - now}ms`);
      }),
    );
  }
}
