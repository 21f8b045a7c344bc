import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { BadRequestError } from '../common/http-errors.js';

/**
 * Turn a query string (as returned by `c.req.queries()`) into a validated DTO.
 * Parameters may appear once. Absent ones keep the DTO's initial values.
 */
export function parseQuery<T extends object>(params: {
  dtoClass: new () => T;
  query: Record<string, string[]>;
}): T {
  const payload: Record<string, string> = {};
  const repeated: string[] = [];
  for (const [name, values] of Object.entries(params.query)) {
    if (values.length > 1) {
      repeated.push(`${name} must be given once`);
    }
    payload[name] = values[0] ?? '';
  }
  if (repeated.length > 0) {
    throw new BadRequestError(repeated.join('; '));
  }

  const instance = plainToInstance(params.dtoClass, payload);
  const errors = validateSync(instance, {
    whitelist: true,
    forbidNonWhitelisted: true,
  });

  if (errors.length > 0) {
    throw new BadRequestError(
      errors
        .map(err => (err.constraints ? Object.values(err.constraints).join(', ') : `${err.property} is invalid`))
        .join('; '),
    );
  }

  return instance;
}
