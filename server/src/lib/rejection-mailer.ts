import { createTransport, Transporter } from 'nodemailer';
import { formatMessageId } from './message-id-utils';

export interface RejectionNotice {
  to: string;
  originalSubject: string;
  /** Message-ID of the rejected email, without angle brackets */
  inReplyTo?: string;
  reason: string;
}

export interface RejectionNotifier {
  sendRejection(notice: RejectionNotice): Promise<void>;
}

export function rejectionSubject(originalSubject: string): string {
  const subject = originalSubject.trim();
  return subject ? `[Rejected] ${subject}` : '[Rejected] Your email';
}

export function rejectionText(reason: string): string {
  return [
    'Unfortunately, your email could not be processed.',
    '',
    reason,
    '',
    'This reply was sent automatically; please do not respond to it.'
  ].join('\n');
}

/**
 * Tells senders why their email was not accepted
 */
export class RejectionMailer implements RejectionNotifier {
  constructor(
    private transporter: Pick<Transporter, 'sendMail'>,
    private from: string
  ) {}

  static fromUrl(smtpUrl: string, from: string): RejectionMailer {
    return new RejectionMailer(createTransport(smtpUrl), from);
  }

  async sendRejection(notice: RejectionNotice): Promise<void> {
    const inReplyTo = notice.inReplyTo ? formatMessageId(notice.inReplyTo) : undefined;

    await this.transporter.sendMail({
      from: this.from,
      to: notice.to,
      subject: rejectionSubject(notice.originalSubject),
      text: rejectionText(notice.reason),
      inReplyTo,
      references: inReplyTo,
      headers: {
        // Keep mail servers and vacation responders from answering the rejection
        'Auto-Submitted': 'auto-replied'
      }
    });
  }
}
