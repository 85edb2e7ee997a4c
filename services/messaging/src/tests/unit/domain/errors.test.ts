import { describe, expect, test } from 'vitest';

import {
  ApplicationNotFoundError,
  MessageNotFoundError,
  MessagingError,
  NotifierError,
  StorageError,
  UnauthorizedError,
  ValidationError
} from '../../../domain/errors';

describe('domain errors', () => {
  test.each([
    { error: new ValidationError('since', 'must be a non-negative integer'), name: 'ValidationError', code: 'VALIDATION_ERROR', status: 400 },
    { error: new UnauthorizedError(), name: 'UnauthorizedError', code: 'UNAUTHORIZED', status: 401 },
    { error: new ApplicationNotFoundError(3), name: 'ApplicationNotFoundError', code: 'APPLICATION_NOT_FOUND', status: 404 },
    { error: new MessageNotFoundError(3), name: 'MessageNotFoundError', code: 'MESSAGE_NOT_FOUND', status: 404 },
    { error: new StorageError('getMessageById'), name: 'StorageError', code: 'STORAGE_ERROR', status: 500 },
    { error: new NotifierError('MessagesDeleted'), name: 'NotifierError', code: 'NOTIFIER_ERROR', status: 500 }
  ])('$name carries $code/$status', ({ error, name, code, status }) => {
    expect(error).toBeInstanceOf(MessagingError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe(name);
    expect(error.code).toBe(code);
    expect(error.statusCode).toBe(status);
  });

  test('storage and notifier errors keep their cause', () => {
    const cause = new Error('connection reset');

    expect(new StorageError('createMessage', cause).cause).toBe(cause);
    expect(new NotifierError('MessageCreated', cause).cause).toBe(cause);
  });
});
