import { AddressObject, EmailAddress, ParsedMail, simpleParser } from 'mailparser';
import { convert as htmlToText } from 'html-to-text';
import { normalizeMessageId, normalizeMessageIdArray } from '../message-id-utils';
import { MessageParser, ParsedMessage } from '../../types/incoming-email';
import { EmailUnparsableError } from '../../types/incoming-email-errors';

function flattenAddresses(addresses: EmailAddress[]): string[] {
  return addresses.flatMap(addr => {
    if (addr.group) return flattenAddresses(addr.group);
    return addr.address ? [addr.address.trim()] : [];
  });
}

/**
 * Bare addresses from a mailparser address field, in header order.
 * Case is kept: the local part can carry a case-sensitive reply key.
 */
export function extractAddresses(field: AddressObject | AddressObject[] | undefined): string[] {
  if (!field) return [];
  const objects = Array.isArray(field) ? field : [field];
  return objects.flatMap(obj => flattenAddresses(obj.value));
}

/**
 * Turns raw RFC 5322 bytes into the structured message the receiver works on
 */
export class MailparserMessageParser implements MessageParser {
  async parse(raw: string | Buffer): Promise<ParsedMessage> {
    let parsedMail: ParsedMail;
    try {
      parsedMail = await simpleParser(raw);
    } catch (error: unknown) {
      throw new EmailUnparsableError(error);
    }

    return this._toParsedMessage(parsedMail);
  }

  private _toParsedMessage(parsedMail: ParsedMail): ParsedMessage {
    return {
      messageId: normalizeMessageId(parsedMail.messageId),
      from: extractAddresses(parsedMail.from),
      to: extractAddresses(parsedMail.to),
      references: normalizeMessageIdArray(parsedMail.references),
      subject: parsedMail.subject ?? '',
      headerBlob: parsedMail.headerLines.map(header => header.line).join('\n'),
      body: this._extractBody(parsedMail),
      attachments: parsedMail.attachments.map(attachment => ({
        filename: attachment.filename,
        contentType: attachment.contentType,
        content: attachment.content,
      })),
    };
  }

  /**
   * Plain text part, falling back to the HTML part when text/plain is missing or blank
   */
  private _extractBody(parsedMail: ParsedMail): string {
    const text = parsedMail.text ?? '';
    if (text.trim().length > 0 || !parsedMail.html) {
      return text;
    }

    return htmlToText(parsedMail.html, {
      wordwrap: false,
      preserveNewlines: true,
      selectors: [
        { selector: 'a', options: { ignoreHref: true } },
        { selector: 'img', format: 'skip' }
      ]
    });
  }
}
