import type { Request, Response, NextFunction, RequestHandler } from 'express';
import morgan from 'morgan';
import type { DecisionEngineError } from '@core/errors';
import { SettledDecisionError } from '@core/errors';
import type { ApiResponse } from '@shared/types';

export const requestLogger = morgan('dev');

/** Forward a rejected handler promise to the error middleware. */
export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<unknown>,
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

export function statusForError(error: DecisionEngineError): number {
  switch (error.code) {
    case 'UnknownField':
    case 'OutOfRange':
    case 'BoundaryViolation':
    case 'MissingRationale':
      return 422;
    case 'AdvisoryUnavailable':
    case 'LedgerUnavailable':
      return 503;
  }
}

export function sendEngineError(res: Response, error: DecisionEngineError): void {
  const response: ApiResponse = {
    success: false,
    error: error.message,
    code: error.code,
    reasons: [...error.reasons],
  };
  res.status(statusForError(error)).json(response);
}

function httpStatus(err: Error): number {
  const status: unknown = Reflect.get(err, 'status');
  return typeof status === 'number' && status >= 400 && status < 600 ? status : 500;
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof SettledDecisionError) {
    const response: ApiResponse = { success: false, error: err.message, code: 'Conflict' };
    res.status(409).json(response);
    return;
  }
  const status = httpStatus(err);
  if (status >= 500) console.error('[ERROR]', err.message);
  res.status(status).json({ success: false, error: err.message });
}
