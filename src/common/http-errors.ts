export type HttpErrorStatus = 400 | 403 | 404 | 500 | 503;

export type HttpErrorBody = Record<string, string | number>;

export class HttpError extends Error {
  public readonly statusCode: HttpErrorStatus;
  public readonly body?: HttpErrorBody;

  public constructor(params: { message: string; statusCode: HttpErrorStatus; body?: HttpErrorBody }) {
    super(params.message);
    this.name = 'HttpError';
    this.statusCode = params.statusCode;
    this.body = params.body;
  }
}

export class BadRequestError extends HttpError {
  public constructor(message: string) {
    super({ message, statusCode: 400, body: { statusCode: 400, message, error: 'Bad Request' } });
    this.name = 'BadRequestError';
  }
}

export class ForbiddenError extends HttpError {
  public constructor(message = 'unauthorized') {
    super({ message, statusCode: 403, body: { error: message } });
    this.name = 'ForbiddenError';
  }
}

export class NotFoundError extends HttpError {
  public constructor(message: string) {
    super({ message, statusCode: 404 });
    this.name = 'NotFoundError';
  }
}
