import { promises as fs } from 'node:fs';
import path from 'node:path';
import { isErrnoException } from '../errors.js';

export interface DocumentStore {
  /** Resolves to `null` when no document has been written yet. */
  read(): Promise<string | null>;
  write(body: string): Promise<void>;
  readonly location: string;
}

export class FileDocumentStore implements DocumentStore {
  constructor(private readonly filePath: string) {}

  get location(): string {
    return this.filePath;
  }

  async read(): Promise<string | null> {
    try {
      return await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  // The rename keeps readers from ever observing a half-written document.
  async write(body: string): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${process.pid}.${Date.now()}.tmp`;
    try {
      await fs.writeFile(tempPath, body, 'utf8');
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }
}
