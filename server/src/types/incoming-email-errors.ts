/**
 * Errors raised while processing an incoming email.
 * Every one of them is permanent for the same input; none is retried.
 */

export type ProcessingErrorCode =
  | 'EMPTY_INPUT'
  | 'EMAIL_UNPARSABLE'
  | 'ROUTING_NOT_FOUND'
  | 'USER_NOT_FOUND'
  | 'USER_BLOCKED'
  | 'USER_NOT_AUTHORIZED'
  | 'AUTO_GENERATED_EMAIL'
  | 'NOTEABLE_NOT_FOUND'
  | 'INVALID_NOTE'
  | 'INVALID_ISSUE'
  | 'EMPTY_REPLY';

export class ProcessingError extends Error {
  constructor(message: string, public readonly code: ProcessingErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProcessingError';
  }
}

export class EmptyInputError extends ProcessingError {
  constructor(message: string = 'The email is empty') {
    super(message, 'EMPTY_INPUT');
    this.name = 'EmptyInputError';
  }
}

export class EmailUnparsableError extends ProcessingError {
  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`The email could not be parsed: ${detail}`, 'EMAIL_UNPARSABLE', { cause });
    this.name = 'EmailUnparsableError';
  }
}

export class RoutingNotFoundError extends ProcessingError {
  constructor(message: string = 'No conversation or project matches the reply key') {
    super(message, 'ROUTING_NOT_FOUND');
    this.name = 'RoutingNotFoundError';
  }
}

export class UserNotFoundError extends ProcessingError {
  constructor(message: string = 'No user matches the sender') {
    super(message, 'USER_NOT_FOUND');
    this.name = 'UserNotFoundError';
  }
}

export class UserBlockedError extends ProcessingError {
  constructor(message: string = 'The user is blocked') {
    super(message, 'USER_BLOCKED');
    this.name = 'UserBlockedError';
  }
}

export class UserNotAuthorizedError extends ProcessingError {
  constructor(message: string = 'The user is not allowed to perform this action') {
    super(message, 'USER_NOT_AUTHORIZED');
    this.name = 'UserNotAuthorizedError';
  }
}

export class AutoGeneratedEmailError extends ProcessingError {
  constructor(message: string = 'The email was automatically generated') {
    super(message, 'AUTO_GENERATED_EMAIL');
    this.name = 'AutoGeneratedEmailError';
  }
}

export class NoteableNotFoundError extends ProcessingError {
  constructor(message: string = 'The discussed record no longer exists') {
    super(message, 'NOTEABLE_NOT_FOUND');
    this.name = 'NoteableNotFoundError';
  }
}

export class EmptyReplyError extends ProcessingError {
  constructor(message: string = 'The email has no reply text') {
    super(message, 'EMPTY_REPLY');
    this.name = 'EmptyReplyError';
  }
}

/**
 * Render a heading followed by one "- message" entry per validation failure
 */
export function formatValidationMessages(heading: string, messages: readonly string[]): string {
  return messages.reduce((text, message) => `${text}\n\n- ${message}`, heading);
}

export class InvalidNoteError extends ProcessingError {
  constructor(public readonly validationMessages: string[]) {
    super(
      formatValidationMessages('The comment could not be created for the following reasons:', validationMessages),
      'INVALID_NOTE'
    );
    this.name = 'InvalidNoteError';
  }
}

export class InvalidIssueError extends ProcessingError {
  constructor(public readonly validationMessages: string[]) {
    super(
      formatValidationMessages('The issue could not be created for the following reasons:', validationMessages),
      'INVALID_ISSUE'
    );
    this.name = 'InvalidIssueError';
  }
}

export function isProcessingError(error: unknown): error is ProcessingError {
  return error instanceof ProcessingError;
}
