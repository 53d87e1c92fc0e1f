import pdfParse from 'pdf-parse';
import { HttpError } from '../utils/errors';
import { formatError } from '../utils/helpers';

export const ACCEPTED_EXTENSIONS = ['pdf', 'doc', 'docx'] as const;

export type AcceptedExtension = (typeof ACCEPTED_EXTENSIONS)[number];

function isAcceptedExtension(value: string): value is AcceptedExtension {
  return ACCEPTED_EXTENSIONS.some((extension) => extension === value);
}

export function validateFileExtension(filename: string): AcceptedExtension {
  const dot = filename.lastIndexOf('.');
  const extension = dot === -1 ? '' : filename.slice(dot + 1).toLowerCase();

  if (!isAcceptedExtension(extension)) {
    throw new HttpError(400, 'Invalid file format. Only PDF and DOC/DOCX are allowed.');
  }
  return extension;
}

export async function extractTextFromPdf(contents: Buffer): Promise<string> {
  try {
    const { text } = await pdfParse(contents);
    return text;
  } catch (error) {
    throw new HttpError(500, `Error extracting text from PDF: ${formatError(error)}`, { cause: error });
  }
}

export async function extractText(contents: Buffer, extension: AcceptedExtension): Promise<string> {
  if (extension === 'pdf') {
    return extractTextFromPdf(contents);
  }
  // DOC/DOCX pass validation but have no extractor yet
  throw new HttpError(400, 'Only PDF files are currently supported');
}
