import { pgTable, serial, varchar, integer, text, timestamp } from 'drizzle-orm/pg-core';

export const resumes = pgTable('resumes', {
  id: serial('id').primaryKey(),
  filename: varchar('filename', { length: 255 }).notNull(),
  fileSize: integer('file_size').notNull(),
  fileUrl: text('file_url').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
});

// Mirrors the table definition above; executed on startup, safe to repeat
export const createResumesTable = `
  CREATE TABLE IF NOT EXISTS resumes (
    id serial PRIMARY KEY,
    filename varchar(255) NOT NULL,
    file_size integer NOT NULL,
    file_url text NOT NULL,
    created_at timestamp with time zone DEFAULT now() NOT NULL
  )
`;

// Type exports for TypeScript
export type Resume = typeof resumes.$inferSelect;
export type NewResume = typeof resumes.$inferInsert;
