import EmailReplyParser from 'email-reply-parser';
import { ParsedMessage, QuoteStripper } from '../../types/incoming-email';

/**
 * Separators email clients put between a reply and the message it quotes.
 * Everything from the separator onwards is quoted history.
 */
const QUOTE_SEPARATORS: RegExp[] = [
  // Outlook
  /(?:\r?\n|^)-{3,}\s*Original Message\s*-{3,}[\s\S]*/i,
  // Gmail / Apple Mail forwards
  /(?:\r?\n|^)-{4,}\s*Forwarded message\s*-{4,}[\s\S]*/i,
  /(?:\r?\n|^)Begin forwarded message:\s*(?:\r?\n)+[\s\S]*/i,
  // "On DATE, PERSON wrote:" when the client wrapped it over two lines
  /(?:\r?\n)+On\s+[^\n]+\r?\n[^\n]*wrote:\s*(?:\r?\n|$)[\s\S]*/i,
  // Outlook-style header block (From: / Sent: / To: / Subject:)
  /(?:\r?\n){2,}From:\s*.+?(?:\r?\n)+(?:Sent|Date):\s*.+?(?:\r?\n)+To:\s*.+?(?:\r?\n)+Subject:\s*.+?(?:\r?\n)+[\s\S]*/i
];

/**
 * Extracts the text a person actually wrote from a reply email,
 * dropping quoted history and signatures
 */
export class ReplyParser implements QuoteStripper {
  private parser: EmailReplyParser;

  constructor() {
    this.parser = new EmailReplyParser();
  }

  extractReply(message: ParsedMessage): string {
    return this.extractText(message.body);
  }

  extractText(body: string): string {
    if (!body || body.trim() === '') {
      return '';
    }

    const preprocessed = this._cutQuoteSeparators(body.replace(/\r\n/g, '\n'));

    return this.parser
      .read(preprocessed)
      .getFragments()
      .filter(fragment => !fragment.isQuoted() && !fragment.isHidden())
      .map(fragment => fragment.getContent())
      .join('\n')
      .trim();
  }

  private _cutQuoteSeparators(body: string): string {
    return QUOTE_SEPARATORS.reduce((text, pattern) => text.replace(pattern, ''), body);
  }
}

export const replyParser = new ReplyParser();
