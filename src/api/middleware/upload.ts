import multer from 'multer';
import { config } from '../../config';

// Files stay in memory; StorageService decides where they land on disk
export const resumeUpload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: config.uploads.maxBytes,
    files: 1,
  },
}).single('file');
