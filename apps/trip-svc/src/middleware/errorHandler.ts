import { NextFunction, Request, RequestHandler, Response } from 'express';
import { ApiResponse, AppError, ErrorCodes, generateTraceId } from '@tripplanner/shared';

export function traceIdOf(res: Response): string {
  const traceId: unknown = res.locals.traceId;
  return typeof traceId === 'string' ? traceId : '';
}

// Request tracing
export const traceRequests: RequestHandler = (req, res, next) => {
  const traceId = req.header('x-trace-id') || generateTraceId();
  res.locals.traceId = traceId;
  res.setHeader('X-Trace-Id', traceId);
  next();
};

export function sendData<T>(res: Response, data: T, status = 200): void {
  const response: ApiResponse<T> = { success: true, data, traceId: traceIdOf(res) };
  res.status(status).json(response);
}

function sendError(res: Response, status: number, error: NonNullable<ApiResponse['error']>): void {
  const response: ApiResponse = { success: false, error, traceId: traceIdOf(res) };
  res.status(status).json(response);
}

export const notFound: RequestHandler = (req, res) => {
  sendError(res, 404, { code: ErrorCodes.NOT_FOUND, message: 'Endpoint not found' });
};

function isMalformedBody(err: unknown): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

/**
 * Maps AppErrors onto the envelope. Anything else is logged and reported as a bare 500.
 */
export function errorHandler(service: string) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) {
        console.error(`${service} error (${req.method} ${req.path}):`, err.message);
      } else {
        console.warn(`${service} rejected ${req.method} ${req.path}: ${err.message}`);
      }
      sendError(res, err.statusCode, { code: err.code, message: err.message, details: err.details });
      return;
    }
    if (isMalformedBody(err)) {
      sendError(res, 400, { code: ErrorCodes.BAD_REQUEST, message: 'Malformed request body' });
      return;
    }
    console.error(`${service} error:`, err);
    sendError(res, 500, { code: ErrorCodes.INTERNAL_ERROR, message: 'Internal server error' });
  };
}
