import { Router, Request, Response, NextFunction } from 'express';
import { logger } from '../../utils/logger';
import { HttpError } from '../../utils/errors';
import { resumeService } from '../../services/resumeService';
import { resumeUpload } from '../middleware/upload';
import type { Resume } from '../../db';

const router: Router = Router();

function toResponse(resume: Resume) {
  return {
    id: resume.id,
    filename: resume.filename,
    fileSize: resume.fileSize,
    fileUrl: resume.fileUrl,
    createdAt: resume.createdAt,
  };
}

// POST /api/resumes/upload
router.post('/upload', resumeUpload, async (req: Request, res: Response, next: NextFunction) => {
  try {
    if (!req.file) {
      throw new HttpError(400, 'No file provided. Send the resume as multipart field "file".');
    }

    const result = await resumeService.uploadResume({
      originalname: req.file.originalname,
      buffer: req.file.buffer,
    });

    logger.info(`Uploaded resume ${result.resumeId} (score ${result.atsScore.atsScore})`);

    return res.status(201).json({
      filename: result.filename,
      resumeId: result.resumeId,
      atsScore: result.atsScore,
      message: 'File uploaded successfully.',
    });
  } catch (error) {
    return next(error);
  }
});

// GET /api/resumes
router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
  try {
    const rows = await resumeService.listResumes();
    return res.json(rows.map(toResponse));
  } catch (error) {
    return next(error);
  }
});

// GET /api/resumes/:id
router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const id = Number(req.params.id);
    if (!Number.isInteger(id) || id <= 0) {
      throw new HttpError(400, 'Resume id must be a positive integer');
    }

    const resume = await resumeService.getResume(id);
    if (!resume) {
      throw new HttpError(404, 'Resume not found');
    }

    return res.json(toResponse(resume));
  } catch (error) {
    return next(error);
  }
});

export default router;
