import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import '../types/express';

const REQUEST_ID_HEADER = 'X-Request-Id';
const MAX_REQUEST_ID_LENGTH = 128;

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();
  const incomingRequestId = req.get(REQUEST_ID_HEADER)?.trim();
  const requestId = incomingRequestId && incomingRequestId.length <= MAX_REQUEST_ID_LENGTH
    ? incomingRequestId
    : randomUUID();
  req.requestId = requestId;
  res.setHeader(REQUEST_ID_HEADER, requestId);

  res.on('finish', () => {
    const duration = Date.now() - start;
    console.log(
      `[${requestId}] ${req.method} ${req.originalUrl} - ${res.statusCode} - ${duration}ms`,
    );
  });

  next();
}
