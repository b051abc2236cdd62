/**
 * Error with an HTTP status and a stable machine-readable code. Routes
 * send `toJSON()` as the response body.
 */
export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: true,
      statusCode: this.statusCode,
      code: this.code,
      message: this.message,
      details: this.details
    };
  }
}

/** Malformed or missing input (400). */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, 'VALIDATION_ERROR', message, details);
  }
}

/** Missing or malformed acting-user header (401). */
export class UnauthorizedError extends AppError {
  constructor(message: string = 'Unauthorized') {
    super(401, 'UNAUTHORIZED', message);
  }
}

/** Not a project member, or refused by the authorizer (403). */
export class ForbiddenError extends AppError {
  constructor(message: string = 'Access forbidden') {
    super(403, 'FORBIDDEN', message);
  }
}

/** Unknown project, task, subtask or message (404). */
export class NotFoundError extends AppError {
  constructor(resource: string, id?: string) {
    super(404, 'NOT_FOUND', id ? `${resource} with id '${id}' not found` : `${resource} not found`);
  }
}

/** Well-formed request that the current state does not allow (422). */
export class BusinessRuleError extends AppError {
  constructor(message: string, details?: unknown) {
    super(422, 'BUSINESS_RULE_ERROR', message, details);
  }
}

/** Image data that is empty, not base64, or too large (422). */
export class AttachmentLoadError extends AppError {
  constructor(fileName: string, reason: string) {
    super(422, 'ATTACHMENT_LOAD_FAILED', `Failed to load attachment '${fileName}': ${reason}`, { fileName, reason });
  }
}

/** Invalid environment; raised at startup (500). */
export class ConfigError extends AppError {
  constructor(message: string) {
    super(500, 'CONFIG_ERROR', message);
  }
}
