import { InvalidArgumentError } from '../errors.js';
import type { JotSchema } from '../jot.js';

/** Runs a request body through `schema`, turning shape errors into 400s. */
export function parseBody<T>(schema: JotSchema<T>, value: unknown): T {
  try {
    return schema.parse(value, 'body');
  } catch (error) {
    if (error instanceof TypeError) {
      throw new InvalidArgumentError(error.message, { cause: error });
    }
    throw error;
  }
}
