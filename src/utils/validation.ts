import Joi from 'joi';
import { ValidationError } from './errors';

/**
 * Validate input against a Joi schema, returning the converted value
 */
export const validate = <T>(schema: Joi.ObjectSchema<T>, input: unknown): T => {
  const result = schema.validate(input, { stripUnknown: true });
  if (result.error) {
    throw new ValidationError(result.error.details[0]?.message || 'Validation failed');
  }
  return result.value;
};

export const uuidParam = Joi.string().uuid().required().messages({
  'string.guid': 'ID must be a valid UUID',
  'any.required': 'ID is required',
});

export const idParamsSchema = Joi.object<{ id: string }>({ id: uuidParam });

// Date-times without an offset would be read in the host's local zone; bare dates parse as UTC
const UTC_ANCHORED = /(?:Z|[+-]\d{2}:?\d{2})$|^\d{4}-\d{2}-\d{2}$/i;

/**
 * ISO 8601 date, or date-time carrying `Z` or an explicit `±hh:mm` offset
 */
export const isoDateTime = (label: string): Joi.DateSchema =>
  Joi.date()
    .iso()
    .custom((value: Date, helpers) => {
      const raw: unknown = helpers.original;
      return typeof raw === 'string' && !UTC_ANCHORED.test(raw) ? helpers.error('date.offset') : value;
    })
    .messages({
      'date.format': `${label} must be an ISO 8601 date-time`,
      'date.offset': `${label} must include a timezone offset`,
    });
