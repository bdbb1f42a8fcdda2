export class ChatServiceError extends Error {
  code: string;
  status: number;
  details: unknown;

  constructor(code: string, status: number, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
    this.details = details;
  }
}

export class AuthenticationError extends ChatServiceError {
  constructor(message = "Authentication required.", code = "auth_required") {
    super(code, 401, message);
  }
}

export class AuthorizationError extends ChatServiceError {
  constructor(message = "You do not have access to this resource.", code = "forbidden") {
    super(code, 403, message);
  }
}

export class ValidationError extends ChatServiceError {
  constructor(message: string, details?: unknown, code = "invalid_request") {
    super(code, 400, message, details);
  }
}

export class NotFoundError extends ChatServiceError {
  constructor(message: string, code = "not_found") {
    super(code, 404, message);
  }
}

export class ConflictError extends ChatServiceError {
  constructor(message: string, code = "conflict") {
    super(code, 409, message);
  }
}

/** A write to one live connection failed. Logged and never reported to the sender. */
export class DeliveryError extends ChatServiceError {
  readonly connectionId: string;

  constructor(connectionId: string, message: string, options?: { cause?: unknown }) {
    super("delivery_failed", 503, message);
    this.connectionId = connectionId;
    if (options && "cause" in options) {
      this.cause = options.cause;
    }
  }
}
