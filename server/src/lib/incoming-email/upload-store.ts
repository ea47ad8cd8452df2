import { mkdir, writeFile } from 'fs/promises';
import path from 'path';

/**
 * Where uploaded attachments end up. Returns the URL the file is served under.
 */
export interface UploadStore {
  save(relativePath: string, content: Buffer): Promise<string>;
}

/**
 * Stores uploads on the local filesystem below `rootDir`, served under `baseUrl`
 */
export class LocalUploadStore implements UploadStore {
  constructor(private rootDir: string, private baseUrl: string) {}

  async save(relativePath: string, content: Buffer): Promise<string> {
    const target = path.resolve(this.rootDir, relativePath);
    if (!target.startsWith(path.resolve(this.rootDir) + path.sep)) {
      throw new Error(`Upload path escapes the upload directory: ${relativePath}`);
    }

    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, content);

    const urlPath = relativePath.split('/').map(segment => encodeURIComponent(segment)).join('/');
    return `${this.baseUrl}/${urlPath}`;
  }
}
