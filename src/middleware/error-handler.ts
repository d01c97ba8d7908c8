import { Request, Response, NextFunction } from 'express';
import { MulterError } from 'multer';
import { AppError, UnauthenticatedError } from '../common/errors/app-error';
import { createClientErrorResponse, createServerErrorResponse } from '../common/dto/api-response.dto';
import { GatewayError } from '../modules/face/face.errors';
import { faceImageTooLargeError } from './upload';
import '../types/express';

interface BodyParserError {
  status: number;
  type: string;
}

function isBodyParserError(err: unknown): err is BodyParserError {
  return err instanceof Error
    && 'status' in err && typeof err.status === 'number'
    && 'type' in err && typeof err.type === 'string';
}

export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }
  const { requestId } = req;

  if (err instanceof MulterError && err.code === 'LIMIT_FILE_SIZE') {
    err = faceImageTooLargeError();
  }

  if (err instanceof AppError) {
    if (err instanceof GatewayError) {
      console.error(`[${requestId ?? '-'}] Face gateway failure (${err.reason}) during ${err.operation}: ${err.detail}`);
    }
    if (err instanceof UnauthenticatedError) {
      res.setHeader('WWW-Authenticate', 'Bearer');
    }

    const isClientError = err.httpStatus >= 400 && err.httpStatus < 500;
    const body = isClientError
      ? createClientErrorResponse(err.code, err.message, err.details, requestId)
      : createServerErrorResponse(err.code, err.message, requestId);

    res.status(err.httpStatus).json(body);
    return;
  }

  if (err instanceof MulterError) {
    res.status(400).json(createClientErrorResponse(err.code, err.message, undefined, requestId));
    return;
  }

  if (isBodyParserError(err) && err.status >= 400 && err.status < 500) {
    res.status(err.status).json(createClientErrorResponse('INVALID_REQUEST_BODY', 'Request body could not be parsed', undefined, requestId));
    return;
  }

  console.error(`[${requestId ?? '-'}] Unexpected error:`, err);
  res.status(500).json(createServerErrorResponse('INTERNAL_ERROR', 'An unexpected error occurred', requestId));
}
