import { randomBytes } from 'crypto';
import path from 'path';
import { UploadStore } from './upload-store';
import {
  AttachmentProcessor,
  MessageAttachment,
  ParsedMessage,
  Project,
  UploadedAttachment
} from '../../types/incoming-email';

const IMAGE_EXTENSIONS = new Set(['.png', '.jpg', '.jpeg', '.gif', '.bmp', '.tiff', '.ico', '.svg', '.webp']);

/**
 * Replace anything outside a conservative character set so the name is safe as a path segment
 */
export function sanitizeFilename(filename: string): string {
  const base = filename.split(/[\\/]/).pop() ?? '';
  const cleaned = base.replace(/[^a-zA-Z0-9_.\-+]/g, '_').replace(/^\.+/, '');
  return cleaned || 'attachment';
}

export function isImageAttachment(attachment: Pick<MessageAttachment, 'filename' | 'contentType'>): boolean {
  if (attachment.contentType.toLowerCase().startsWith('image/')) return true;
  const extension = path.extname(attachment.filename ?? '').toLowerCase();
  return IMAGE_EXTENSIONS.has(extension);
}

export function escapeLinkText(text: string): string {
  return text.replace(/[\\[\]]/g, match => `\\${match}`);
}

export function attachmentMarkdown(alt: string, url: string, isImage: boolean): string {
  return `${isImage ? '!' : ''}[${escapeLinkText(alt)}](${url})`;
}

/**
 * Uploads the attachments of an incoming email to the target project and
 * returns one link per stored file, in message order
 */
export class AttachmentUploader implements AttachmentProcessor {
  constructor(
    private store: UploadStore,
    private generateSecret: () => string = () => randomBytes(16).toString('hex')
  ) {}

  async process(message: ParsedMessage, project: Project): Promise<UploadedAttachment[]> {
    const uploaded: UploadedAttachment[] = [];

    for (const attachment of message.attachments) {
      if (!attachment.filename) continue;

      const filename = sanitizeFilename(attachment.filename);
      const relativePath = `${project.fullPath}/${this.generateSecret()}/${filename}`;
      const url = await this.store.save(relativePath, attachment.content);

      const isImage = isImageAttachment(attachment);
      // Images get their name without extension as alt text, other files keep the full name
      const alt = isImage ? path.basename(attachment.filename, path.extname(attachment.filename)) : attachment.filename;

      uploaded.push({ alt, url, isImage, markdown: attachmentMarkdown(alt, url, isImage) });
    }

    return uploaded;
  }
}
