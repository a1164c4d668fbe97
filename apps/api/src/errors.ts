import { EngineError } from '@loansim/engine';

export class AppError extends Error {
  constructor(
    public code: string,
    message: string,
    public status: 400 | 401 | 404 | 500 = 400,
    public suggestion = '',
  ) {
    super(message);
  }
}

export const notFound = (entity: string, id: string) =>
  new AppError(
    'NOT_FOUND',
    `${entity} '${id}' not found`,
    404,
    `Use GET /api/v1/${entity.toLowerCase()}s to list available IDs`,
  );

export const validationError = (message: string) =>
  new AppError('VALIDATION_ERROR', message, 400, 'Check request body');

const ENGINE_SUGGESTIONS: Record<string, string> = {
  INPUT_VALIDATION: 'Check the loan file header and the values on the reported row',
  CONFIGURATION: 'Check the simulation config',
  INVARIANT_VIOLATION: 'This is a bug in payment allocation; please report it with the request body',
};

export function toAppError(err: Error): AppError {
  if (err instanceof AppError) return err;
  if (err instanceof EngineError) {
    const status = err.code === 'INVARIANT_VIOLATION' ? 500 : 400;
    return new AppError(err.code, err.message, status, ENGINE_SUGGESTIONS[err.code] ?? '');
  }
  return new AppError('INTERNAL_ERROR', err.message, 500, 'Check server logs');
}
