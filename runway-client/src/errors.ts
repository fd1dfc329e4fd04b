export class RunwayError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends RunwayError {}

export class ValidationError extends RunwayError {}

export class UnsupportedFormatError extends ValidationError {
  constructor(public readonly format: string) {
    super(`Unsupported image format: ${format}. Use JPG or PNG.`);
  }
}

export class NotFoundError extends RunwayError {
  constructor(public readonly path: string) {
    super(`Image file not found: ${path}`);
  }
}

export class UnsupportedMethodError extends RunwayError {
  constructor(public readonly method: string) {
    super(`Unsupported HTTP method: ${method}`);
  }
}

/**
 * Non-2xx response from the API. `body` is the raw response text.
 */
export class TransportError extends RunwayError {
  constructor(
    message: string,
    public readonly status: number,
    public readonly body: string
  ) {
    super(message);
  }
}

export class ResponseFormatError extends RunwayError {
  constructor(
    message: string,
    public readonly body: string,
    public readonly status?: number
  ) {
    super(message);
  }
}
