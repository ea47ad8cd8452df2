/**
 * Incoming email job handler
 * Runs the EmailReceiver for one queued message and answers rejected senders
 */

import { EmailReceiver, EmailReceiverDependencies, ReceiverRoute, isBlank } from './email-receiver';
import { rejectionReasonFor } from './rejection-reasons';
import { RejectionNotifier } from '../rejection-mailer';
import { ProcessingError, ProcessingErrorCode, isProcessingError } from '../../types/incoming-email-errors';

export interface IncomingEmailJobData {
  /** The message bytes exactly as received, base64 encoded */
  rawBase64: string;
  receivedAt: string;
}

export function encodeRawEmail(raw: Buffer): string {
  return raw.toString('base64');
}

export function decodeRawEmail(data: IncomingEmailJobData): Buffer {
  return Buffer.from(data.rawBase64, 'base64');
}

export type IncomingEmailJobResult =
  | { status: 'processed'; route: ReceiverRoute }
  | { status: 'rejected'; code: ProcessingErrorCode; notified: boolean };

export interface IncomingEmailJobDependencies {
  receiver: EmailReceiverDependencies;
  notifier: RejectionNotifier;
}

export async function processIncomingEmail(
  data: IncomingEmailJobData,
  deps: IncomingEmailJobDependencies
): Promise<IncomingEmailJobResult> {
  const raw = decodeRawEmail(data);

  try {
    const route = await new EmailReceiver(raw, deps.receiver).execute();
    return { status: 'processed', route };
  } catch (error: unknown) {
    if (!isProcessingError(error)) {
      throw error;
    }

    console.warn(`[EmailReceiverWorker] Rejected email received at ${data.receivedAt}: ${error.code}`);
    const notified = await notifySender(raw, error, deps);
    return { status: 'rejected', code: error.code, notified };
  }
}

async function notifySender(
  raw: Buffer,
  error: ProcessingError,
  deps: IncomingEmailJobDependencies
): Promise<boolean> {
  const reason = rejectionReasonFor(error);
  if (!reason || isBlank(raw)) {
    return false;
  }

  const message = await deps.receiver.parser.parse(raw);
  const sender = message.from[0];
  if (!sender) {
    console.warn('[EmailReceiverWorker] Rejected email has no sender address, not replying');
    return false;
  }

  await deps.notifier.sendRejection({
    to: sender,
    originalSubject: message.subject,
    inReplyTo: message.messageId,
    reason
  });
  return true;
}
