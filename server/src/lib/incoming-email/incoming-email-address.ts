import { IncomingEmailSettings } from '../config';
import { formatMessageId, normalizeMessageId } from '../message-id-utils';
import { ReplyKeyScheme } from '../../types/incoming-email';

const KEY_PLACEHOLDER = '%{key}';

function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Reply addresses and fallback Message-IDs carrying a reply key.
 *
 * Outgoing notifications are sent from `incoming+KEY@host` (the configured
 * template) with a Message-ID of `<reply-KEY@app-host>`. Relays that rewrite
 * the To header usually keep References, so both are checked on the way in.
 */
export class IncomingEmailAddress implements ReplyKeyScheme {
  private readonly addressRegex: RegExp | null;
  private readonly fallbackMessageIdRegex: RegExp;

  constructor(
    private readonly settings: Pick<IncomingEmailSettings, 'enabled' | 'address'>,
    private readonly appHost: string
  ) {
    this.addressRegex = this.supportsWildcard()
      ? new RegExp(`^${escapeRegex(settings.address).replace(escapeRegex(KEY_PLACEHOLDER), '(.+)')}$`, 'i')
      : null;
    this.fallbackMessageIdRegex = new RegExp(`^reply-(.+)@${escapeRegex(appHost)}$`, 'i');
  }

  enabled(): boolean {
    return this.settings.enabled && this.settings.address.length > 0;
  }

  /**
   * Whether the address template can carry a per-notification key
   */
  supportsWildcard(): boolean {
    return this.enabled() && this.settings.address.includes(KEY_PLACEHOLDER);
  }

  replyAddress(key: string): string {
    return this.settings.address.replace(KEY_PLACEHOLDER, () => key);
  }

  fallbackReplyMessageId(key: string): string {
    return formatMessageId(`reply-${key}@${this.appHost}`);
  }

  keyFromAddress(address: string): string | null {
    if (!this.addressRegex) return null;
    const match = address.trim().match(this.addressRegex);
    return match ? match[1] : null;
  }

  keyFromFallbackReplyMessageId(messageId: string): string | null {
    if (!this.enabled()) return null;
    const normalized = normalizeMessageId(messageId);
    if (!normalized) return null;
    const match = normalized.match(this.fallbackMessageIdRegex);
    return match ? match[1] : null;
  }
}
