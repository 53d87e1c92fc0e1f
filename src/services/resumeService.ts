import { asc, eq } from 'drizzle-orm';
import { connectionManager, resumes, Resume } from '../db';
import type { ConnectionManager } from '../db';
import { logger } from '../utils/logger';
import { formatError } from '../utils/helpers';
import { recordResumeUpload } from '../utils/metrics';
import { AcceptedExtension, validateFileExtension, extractText } from './documentService';
import { StorageService, storageService } from './storageService';
import { AtsScore, AtsService, atsService } from './atsService';

export interface UploadedFile {
  originalname: string;
  buffer: Buffer;
}

export interface UploadResumeResult {
  resumeId: number;
  filename: string;
  fileSize: number;
  fileUrl: string;
  atsScore: AtsScore;
}

export class ResumeService {
  constructor(
    private readonly connections: ConnectionManager,
    private readonly storage: StorageService,
    private readonly ats: AtsService
  ) {}

  /**
   * Validate, extract, store and record an upload, then score its text.
   * The database session is closed before the scoring call starts.
   */
  async uploadResume(file: UploadedFile): Promise<UploadResumeResult> {
    let extension: AcceptedExtension;
    let textContent: string;
    try {
      extension = validateFileExtension(file.originalname);
      textContent = await extractText(file.buffer, extension);
    } catch (error) {
      recordResumeUpload('rejected');
      throw error;
    }

    const fileSize = file.buffer.length;
    const { storageUrl } = await this.storage.saveUpload(file.originalname, file.buffer);

    let resume: Resume;
    try {
      resume = await this.connections.withSession(async ({ db }) => {
        const [row] = await db
          .insert(resumes)
          .values({ filename: file.originalname, fileSize, fileUrl: storageUrl })
          .returning();
        return row;
      });
    } catch (error) {
      recordResumeUpload('failed');
      await this.storage.deleteUpload(storageUrl).catch((cleanupError: unknown) => {
        logger.warn(`Could not remove orphaned upload ${storageUrl}: ${formatError(cleanupError)}`);
      });
      throw error;
    }

    recordResumeUpload('stored');
    logger.info(`Resume ${resume.id} stored (${fileSize} bytes, ${extension})`);

    const atsScore = await this.ats.checkAtsScore(textContent);

    return {
      resumeId: resume.id,
      filename: resume.filename,
      fileSize: resume.fileSize,
      fileUrl: resume.fileUrl,
      atsScore,
    };
  }

  async getResume(id: number): Promise<Resume | null> {
    return this.connections.withSession(async ({ db }) => {
      const [row] = await db.select().from(resumes).where(eq(resumes.id, id)).limit(1);
      return row ?? null;
    });
  }

  async listResumes(): Promise<Resume[]> {
    return this.connections.withSession(async ({ db }) => {
      return db.select().from(resumes).orderBy(asc(resumes.id));
    });
  }
}

// Singleton instance
export const resumeService = new ResumeService(connectionManager, storageService, atsService);
