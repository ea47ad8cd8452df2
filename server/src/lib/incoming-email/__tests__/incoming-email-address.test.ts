import { IncomingEmailAddress } from '../incoming-email-address';

describe('IncomingEmailAddress', () => {
  const address = new IncomingEmailAddress(
    { enabled: true, address: 'incoming+%{key}@mail.example.com' },
    'app.example.com'
  );

  describe('keyFromAddress', () => {
    it('should extract the key from a reply address', () => {
      expect(address.keyFromAddress('incoming+0123abcd@mail.example.com')).toBe('0123abcd');
    });

    it('should extract a project path used as key', () => {
      expect(address.keyFromAddress('incoming+acme/widgets@mail.example.com')).toBe('acme/widgets');
    });

    it('should ignore case and surrounding whitespace', () => {
      expect(address.keyFromAddress('  Incoming+0123abcd@MAIL.example.com ')).toBe('0123abcd');
    });

    it('should not match other addresses', () => {
      expect(address.keyFromAddress('incoming@mail.example.com')).toBeNull();
      expect(address.keyFromAddress('incoming+0123abcd@mail.example.com.evil.test')).toBeNull();
      expect(address.keyFromAddress('xincoming+0123abcd@mail.example.com')).toBeNull();
    });

    it('should treat the template literally rather than as a pattern', () => {
      // The dot in the domain must not match an arbitrary character
      expect(address.keyFromAddress('incoming+0123abcd@mailxexample.com')).toBeNull();
    });

    it('should return null when incoming email is disabled', () => {
      const disabled = new IncomingEmailAddress(
        { enabled: false, address: 'incoming+%{key}@mail.example.com' },
        'app.example.com'
      );
      expect(disabled.keyFromAddress('incoming+0123abcd@mail.example.com')).toBeNull();
    });

    it('should return null when the template has no key placeholder', () => {
      const fixed = new IncomingEmailAddress({ enabled: true, address: 'incoming@mail.example.com' }, 'app.example.com');

      expect(fixed.supportsWildcard()).toBe(false);
      expect(fixed.keyFromAddress('incoming@mail.example.com')).toBeNull();
    });
  });

  describe('keyFromFallbackReplyMessageId', () => {
    it('should extract the key with or without angle brackets', () => {
      expect(address.keyFromFallbackReplyMessageId('reply-0123abcd@app.example.com')).toBe('0123abcd');
      expect(address.keyFromFallbackReplyMessageId('<reply-0123abcd@app.example.com>')).toBe('0123abcd');
    });

    it('should not match ids from other hosts or without the reply prefix', () => {
      expect(address.keyFromFallbackReplyMessageId('reply-0123abcd@other.example.com')).toBeNull();
      expect(address.keyFromFallbackReplyMessageId('0123abcd@app.example.com')).toBeNull();
      expect(address.keyFromFallbackReplyMessageId('')).toBeNull();
    });
  });

  describe('outgoing helpers', () => {
    it('should build the reply address for a key', () => {
      expect(address.replyAddress('0123abcd')).toBe('incoming+0123abcd@mail.example.com');
    });

    it('should build a fallback message id that reads back to the same key', () => {
      const messageId = address.fallbackReplyMessageId('0123abcd');

      expect(messageId).toBe('<reply-0123abcd@app.example.com>');
      expect(address.keyFromFallbackReplyMessageId(messageId)).toBe('0123abcd');
    });

    it('should report wildcard support for a template with a placeholder', () => {
      expect(address.supportsWildcard()).toBe(true);
    });
  });
});
