import { ProcessingError, ProcessingErrorCode } from '../../types/incoming-email-errors';

/**
 * What the sender is told when their email is rejected. Parse failures are
 * garbage input and get no reply, validation failures explain themselves.
 */
const REJECTION_REASONS: Record<Exclude<ProcessingErrorCode, 'EMAIL_UNPARSABLE' | 'INVALID_NOTE' | 'INVALID_ISSUE'>, string> = {
  EMPTY_INPUT:
    'The email you sent was empty.',
  EMPTY_REPLY:
    "We couldn't find any text in your email. Make sure your reply is at the top of the email; inline replies can't be processed.",
  ROUTING_NOT_FOUND:
    "We couldn't tell what your email is replying to. Reply to a notification email, or send it to the address shown on the project page.",
  USER_NOT_FOUND:
    "We couldn't match the address you sent from to an account. Send the email from an address registered on your account.",
  USER_BLOCKED:
    'Your account has been blocked. Contact an administrator to have it unblocked.',
  USER_NOT_AUTHORIZED:
    "You don't have permission to do this in the project your email was sent to. Ask a project maintainer for access.",
  AUTO_GENERATED_EMAIL:
    'Your email looks automatically generated, for example an out-of-office reply, so it was not posted.',
  NOTEABLE_NOT_FOUND:
    'The thread you replied to no longer exists, or you no longer have access to it.'
};

export function rejectionReasonFor(error: ProcessingError): string | null {
  switch (error.code) {
    case 'EMAIL_UNPARSABLE':
      return null;
    case 'INVALID_NOTE':
    case 'INVALID_ISSUE':
      return error.message;
    default:
      return REJECTION_REASONS[error.code];
  }
}
