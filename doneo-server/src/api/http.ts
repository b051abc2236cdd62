import { Request, Response } from 'express';
import { AppError, UnauthorizedError } from '../domain/common/Errors';
import { ILogger } from '../domain/common/ILogger';
import { actorHeaderSchema } from './validation';

export const ACTOR_HEADER = 'x-user-id';

/**
 * Send an AppError as its JSON body, anything else as a 500.
 */
export function handleError(err: unknown, res: Response, logger: ILogger): void {
  if (err instanceof AppError) {
    res.status(err.statusCode).json(err.toJSON());
    return;
  }
  const error = err instanceof Error ? err : new Error(String(err));
  logger.error('Unhandled route error:', error);
  res.status(500).json({
    error: true,
    message: error.message,
    code: 'INTERNAL_ERROR'
  });
}

/**
 * The acting user, taken from the X-User-Id header.
 * @throws {UnauthorizedError} when the header is missing or malformed
 */
export function actorOf(req: Request): string {
  const result = actorHeaderSchema.safeParse(req.header(ACTOR_HEADER));
  if (!result.success) {
    throw new UnauthorizedError(`Missing or invalid ${ACTOR_HEADER} header`);
  }
  return result.data;
}
