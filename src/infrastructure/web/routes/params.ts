import type { Request } from 'express';
import { ValidationError } from '../../../core/errors.js';
import { isPlainObject } from '../../../utils/json.js';

/**
 * Positive integer from the query string, or the fallback when absent
 */
export function queryLimit(req: Request, fallback: number, max: number = 1000): number {
  const raw = req.query.limit;
  if (raw === undefined) return fallback;

  const value = typeof raw === 'string' ? Number(raw) : NaN;
  if (!Number.isInteger(value) || value < 1 || value > max) {
    throw new ValidationError(`limit must be an integer between 1 and ${max}`);
  }
  return value;
}

export function jsonBody(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  if (!isPlainObject(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  return body;
}
