import { ZodError } from 'zod';
import { AppError } from './app-error.js';
import { ErrorCodes } from './error-codes.js';

export interface ValidationIssue {
  field: string;
  message: string;
  code: string;
}

export function formatZodError(error: ZodError, message = 'Validation failed'): AppError {
  const issues: ValidationIssue[] = error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
  }));

  return new AppError(message, 400, true, ErrorCodes.VALIDATION_ERROR, { issues });
}
