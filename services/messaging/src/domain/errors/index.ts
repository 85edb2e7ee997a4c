/**
 * Messaging domain errors
 *
 * Every error a caller can observe carries a stable code and the HTTP
 * status the binding layer answers with.
 */

/**
 * Base error class for messaging domain
 */
export class MessagingError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500
  ) {
    super(message);
    this.name = 'MessagingError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Malformed paging parameters or message body
 */
export class ValidationError extends MessagingError {
  constructor(field: string, reason: string) {
    super(
      `Validation error for ${field}: ${reason}`,
      'VALIDATION_ERROR',
      400
    );
    this.name = 'ValidationError';
  }
}

/**
 * Unknown application token on message creation
 */
export class UnauthorizedError extends MessagingError {
  constructor(reason = 'invalid application token') {
    super(reason, 'UNAUTHORIZED', 401);
    this.name = 'UnauthorizedError';
  }
}

/**
 * Application missing or owned by someone else. The two cases share this
 * error so the response never reveals which one happened.
 */
export class ApplicationNotFoundError extends MessagingError {
  constructor(applicationId: number) {
    super(
      `Application not found: ${applicationId}`,
      'APPLICATION_NOT_FOUND',
      404
    );
    this.name = 'ApplicationNotFoundError';
  }
}

/**
 * Message missing or reachable only through another user's application
 */
export class MessageNotFoundError extends MessagingError {
  constructor(messageId: number) {
    super(
      `Message not found: ${messageId}`,
      'MESSAGE_NOT_FOUND',
      404
    );
    this.name = 'MessageNotFoundError';
  }
}

export class StorageError extends MessagingError {
  constructor(
    public readonly operation: string,
    public readonly cause?: unknown
  ) {
    super(
      `Storage operation failed: ${operation}`,
      'STORAGE_ERROR',
      500
    );
    this.name = 'StorageError';
  }
}

/**
 * Delivery to live listeners failed. Logged by the message service, never
 * thrown to its callers.
 */
export class NotifierError extends MessagingError {
  constructor(
    public readonly eventKind: string,
    public readonly cause?: unknown
  ) {
    super(
      `Notification delivery failed: ${eventKind}`,
      'NOTIFIER_ERROR',
      500
    );
    this.name = 'NotifierError';
  }
}
