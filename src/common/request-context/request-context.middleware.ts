import { Injectable, NestMiddleware } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { REQUEST_ID_HEADER, RequestContext } from './request-context';

@Injectable()
export class RequestContextMiddleware implements NestMiddleware {
  use(req: Request, res: Response, next: NextFunction) {
    const context = RequestContext.bindRequest(req);
    res.setHeader(REQUEST_ID_HEADER, context.requestId);
    RequestContext.run(context, () => next());
  }
}
