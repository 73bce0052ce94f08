export class InvalidSiblingLinksError extends Error {
  constructor(message: string, public readonly statusCode: number = 400) {
    super(message);
    this.name = 'InvalidSiblingLinksError';
  }
}

export class TemplateError extends Error {
  constructor(message: string, public readonly statusCode: number = 500) {
    super(message);
    this.name = 'TemplateError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, public readonly statusCode: number = 500) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * HTTP status for an error thrown anywhere in the pipeline.
 */
export function statusCodeOf(err: unknown): number {
  if (
    err instanceof InvalidSiblingLinksError ||
    err instanceof TemplateError ||
    err instanceof ConfigError
  ) {
    return err.statusCode;
  }
  return 500;
}
