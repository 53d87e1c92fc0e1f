import fs from 'fs/promises';
import path from 'path';
import crypto from 'crypto';
import { config } from '../config';
import { logger } from '../utils/logger';

export interface StorageResult {
  storageUrl: string;
  size: number;
}

export class StorageService {
  private readonly baseDir: string;

  constructor(baseDir: string = config.uploads.dir) {
    this.baseDir = baseDir;
  }

  async initialize(): Promise<void> {
    await fs.mkdir(this.baseDir, { recursive: true });
    logger.info(`Storage service initialized at ${this.baseDir}`);
  }

  /**
   * Short content hash used to keep same-named uploads apart
   */
  private hashContent(buffer: Buffer): string {
    return crypto.createHash('sha256').update(buffer).digest('hex').substring(0, 12);
  }

  /**
   * Upload names come from the client; keep only the final path segment
   */
  static sanitizeFilename(filename: string): string {
    const base = path.basename(filename.replace(/\\/g, '/'));
    const cleaned = base.replace(/[^A-Za-z0-9._-]/g, '_');
    return cleaned.replace(/^\.+/, '') || 'upload';
  }

  /**
   * Save an uploaded file
   * Structure: <uploadDir>/<content-hash>-<upload-id>-<sanitized-name>
   * The upload id keeps every save on its own path, even for identical files.
   */
  async saveUpload(filename: string, buffer: Buffer): Promise<StorageResult> {
    await fs.mkdir(this.baseDir, { recursive: true });

    const uploadId = crypto.randomBytes(4).toString('hex');
    const storedName = `${this.hashContent(buffer)}-${uploadId}-${StorageService.sanitizeFilename(filename)}`;
    const fullPath = path.join(this.baseDir, storedName);

    await fs.writeFile(fullPath, buffer);
    const stats = await fs.stat(fullPath);

    logger.info(`Upload saved: ${storedName} (${stats.size} bytes)`);

    return {
      storageUrl: storedName,
      size: stats.size,
    };
  }

  async deleteUpload(storageUrl: string): Promise<void> {
    await fs.unlink(this.resolve(storageUrl));
    logger.info(`Upload deleted: ${storageUrl}`);
  }

  private resolve(storageUrl: string): string {
    return path.join(this.baseDir, path.basename(storageUrl));
  }
}

// Singleton instance
export const storageService = new StorageService();
