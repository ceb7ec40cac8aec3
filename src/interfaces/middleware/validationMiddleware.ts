import { Request, Response, NextFunction } from 'express';
import Joi from 'joi';
import { logger } from '../../infrastructure/logging/Logger';

type RequestPart = 'body' | 'params' | 'query';
const REQUEST_PARTS: readonly RequestPart[] = ['body', 'params', 'query'];

/**
 * Validates the request parts the schema declares and replaces them with
 * the converted values
 */
export function validate(schema: Joi.ObjectSchema) {
  const keys: Record<string, unknown> = schema.describe().keys ?? {};
  const declared = REQUEST_PARTS.filter(part => part in keys);

  return (req: Request, res: Response, next: NextFunction) => {
    const validationObject: Partial<Record<RequestPart, unknown>> = {};
    for (const part of declared) {
      validationObject[part] = req[part];
    }

    const { error, value } = schema.validate(validationObject, {
      abortEarly: false,
      stripUnknown: true
    });

    if (error) {
      const details = error.details.map(detail => ({
        field: detail.path.join('.'),
        message: detail.message
      }));

      logger.warn('Validation failed', {
        path: req.path,
        errors: details
      });

      res.status(400).json({
        success: false,
        error: 'Validation failed',
        code: 'VALIDATION_ERROR',
        details
      });
      return;
    }

    if (value.body) req.body = value.body;
    if (value.params) req.params = value.params;
    if (value.query) req.query = value.query;

    next();
  };
}
