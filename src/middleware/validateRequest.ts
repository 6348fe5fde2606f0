import { Request, Response, NextFunction } from 'express';
import type { ObjectSchema, ValidationError } from 'joi';
import { ApiError, type FieldErrors } from '@/utils/ApiError';

export const toFieldErrors = (error: ValidationError): FieldErrors => {
  const errors: FieldErrors = {};

  for (const detail of error.details) {
    const field = String(detail.path[0] ?? 'non_field_errors');
    (errors[field] ??= []).push(detail.message);
  }

  return errors;
};

/**
 * Extra checks against stored data, run after the schema. `invalid` holds
 * the fields the schema already rejected.
 */
export type RequestCheck = (body: Record<string, unknown>, invalid: ReadonlySet<string>) => Promise<FieldErrors>;

const mergeFieldErrors = (target: FieldErrors, extra: FieldErrors): void => {
  for (const [field, messages] of Object.entries(extra)) {
    (target[field] ??= []).push(...messages);
  }
};

export const validateRequest = (schema: ObjectSchema, check?: RequestCheck) => {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { error, value } = schema.validate(req.body ?? {}, { abortEarly: false });
      const errors: FieldErrors = error ? toFieldErrors(error) : {};

      if (check) {
        mergeFieldErrors(errors, await check(value, new Set(Object.keys(errors))));
      }

      if (Object.keys(errors).length > 0) {
        throw ApiError.badRequest('Validation failed', errors);
      }

      req.body = value;
      next();
    } catch (error) {
      next(error);
    }
  };
};
