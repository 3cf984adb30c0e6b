import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';
import { Request } from 'express';

export interface RequestContextData {
  requestId: string;
  ip?: string;
  userAgent?: string;
}

export const REQUEST_ID_HEADER = 'x-request-id';

const storage = new AsyncLocalStorage<RequestContextData>();

export class RequestContext {
  static run(data: RequestContextData, callback: () => void) {
    storage.run(data, callback);
  }

  static get(): RequestContextData | undefined {
    return storage.getStore();
  }

  static requestId(): string | undefined {
    return storage.getStore()?.requestId;
  }

  static bindRequest(req: Request): RequestContextData {
    const header = req.headers[REQUEST_ID_HEADER];
    const requestId = (Array.isArray(header) ? header[0] : header) || randomUUID();
    const forwarded = req.headers['x-forwarded-for'];
    const forwardedFor = Array.isArray(forwarded) ? forwarded[0] : forwarded;
    return {
      requestId,
      ip: (req.ip || forwardedFor || '').split(',')[0].trim(),
      userAgent: req.headers['user-agent'],
    };
  }
}
