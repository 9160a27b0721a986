export class SkyscannerError extends Error {
  code: string;
  response?: unknown;

  constructor(message: string, code: string, response?: unknown) {
    super(message);
    this.name = 'SkyscannerError';
    this.code = code;
    this.response = response;
  }
}

/** Caller input rejected before any request was sent. */
export class ValidationError extends SkyscannerError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

/** The backend flagged the traffic as automated and answered with a captcha redirect. */
export class CaptchaBanError extends SkyscannerError {
  url: string;

  constructor(url: string) {
    super(`Banned with captcha, solve it at ${url}`, 'CAPTCHA_BAN');
    this.name = 'CaptchaBanError';
    this.url = url;
  }
}

export class IncompleteSearchError extends SkyscannerError {
  attempts: number;

  constructor(attempts: number) {
    super(`Search still incomplete after ${attempts} attempts`, 'INCOMPLETE_SEARCH');
    this.name = 'IncompleteSearchError';
    this.attempts = attempts;
  }
}

export class TransportError extends SkyscannerError {
  statusCode: number;
  body: string;

  constructor(message: string, statusCode: number, body: string) {
    super(`${message}, status_code: ${statusCode} response: ${body}`, 'TRANSPORT_ERROR', body);
    this.name = 'TransportError';
    this.statusCode = statusCode;
    this.body = body;
  }
}

export class ConfigurationError extends SkyscannerError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class NotFoundError extends SkyscannerError {
  constructor(message: string) {
    super(message, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}
