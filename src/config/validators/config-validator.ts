export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

export abstract class BaseValidator<T> {
  public abstract validate(value: unknown, path: string): asserts value is T;

  protected assertType(
    value: unknown,
    type: string,
    path: string,
  ): asserts value is Record<string, unknown> {
    if (typeof value !== type || value === null) {
      throw new ConfigValidationError(
        `${path} must be ${type === 'object' ? 'an object' : `a ${type}`}, got ${typeof value === 'object' && value === null ? 'null' : typeof value}`,
      );
    }
  }

  protected assertString(value: unknown, path: string): asserts value is string {
    if (typeof value !== 'string') {
      throw new ConfigValidationError(
        `${path} must be a string, got ${typeof value} (value: ${String(value)})`,
      );
    }
  }

  protected assertNonEmptyString(value: unknown, path: string): asserts value is string {
    this.assertString(value, path);
    if (value.trim() === '') {
      throw new ConfigValidationError(`${path} must not be empty`);
    }
  }

  protected assertNumber(
    value: unknown,
    path: string,
    min?: number,
    max?: number,
  ): asserts value is number {
    if (typeof value !== 'number' || Number.isNaN(value)) {
      throw new ConfigValidationError(
        `${path} must be a number, got ${typeof value} (value: ${String(value)})`,
      );
    }
    if (min !== undefined && value < min) {
      throw new ConfigValidationError(`${path} must be >= ${min}, got ${value}`);
    }
    if (max !== undefined && value > max) {
      throw new ConfigValidationError(`${path} must be <= ${max}, got ${value}`);
    }
  }

  protected assertInteger(
    value: unknown,
    path: string,
    min?: number,
    max?: number,
  ): asserts value is number {
    this.assertNumber(value, path, min, max);
    if (!Number.isInteger(value)) {
      throw new ConfigValidationError(`${path} must be an integer, got ${value}`);
    }
  }

  protected assertUrl(value: unknown, path: string): asserts value is string {
    this.assertNonEmptyString(value, path);
    let protocol: string;
    try {
      protocol = new URL(value).protocol;
    } catch {
      throw new ConfigValidationError(`${path} must be a valid URL, got "${value}"`);
    }
    if (protocol !== 'http:' && protocol !== 'https:') {
      throw new ConfigValidationError(`${path} must be an http(s) URL, got "${value}"`);
    }
  }

  protected assertEnum<T extends string>(
    value: unknown,
    allowedValues: readonly T[],
    path: string,
  ): asserts value is T {
    if (typeof value !== 'string' || !allowedValues.some(allowed => allowed === value)) {
      throw new ConfigValidationError(
        `${path} must be one of: ${allowedValues.join(', ')}, got ${typeof value === 'string' ? `"${value}"` : typeof value}`,
      );
    }
  }
}
