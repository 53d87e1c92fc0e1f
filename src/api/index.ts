import { Router } from 'express';
import resumesRouter from './routes/resumes';

const router: Router = Router();

// Mount route handlers
router.use('/resumes', resumesRouter);

export default router;
