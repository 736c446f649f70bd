// ─── HTTP Errors ──────────────────────────────────────────
// Handlers throw (or next()) these; the error middleware in app.ts
// turns them into a status code and a JSON body.
export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly title: string,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends HttpError {
  constructor(message = "404 Not Found") {
    super(404, "Not Found", message);
  }
}

export class BadRequestError extends HttpError {
  constructor(message: string, public readonly issues?: Record<string, unknown>) {
    super(400, "Bad Request", message);
  }
}

export class MethodNotAllowedError extends HttpError {
  constructor(public readonly allowed: string[], message?: string) {
    super(405, "Method Not Allowed", message ?? `Method not allowed. Allowed: ${allowed.join(", ")}`);
  }
}

export class UnsupportedMediaTypeError extends HttpError {
  constructor(contentType: string) {
    super(415, "Unsupported Media Type", `Content-Type must be ${contentType}`);
  }
}

export const customerNotFound = (id: string) =>
  new NotFoundError(`Customer with id '${id}' was not found.`);
