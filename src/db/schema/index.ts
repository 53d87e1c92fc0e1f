import { createResumesTable } from './resumes';

export { resumes } from './resumes';
export type { Resume, NewResume } from './resumes';

/**
 * DDL for every persisted entity, in dependency order
 */
export const schemaStatements = [createResumesTable];
