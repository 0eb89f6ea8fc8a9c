import { promises as fs } from 'fs';
import { z } from 'zod';
import type { ReviewInput } from '../types';
import { InputError } from '../types';
import { appLogger } from './logging';

/**
 * On-disk input format. Keys are snake_case as written by users.
 */
export const ReviewInputFileSchema = z.object({
  code_snippet: z.string().refine((val) => val.trim().length > 0, {
    message: 'code_snippet must be a non-empty string'
  }),
  review_comments: z
    .array(z.string().refine((val) => val.trim().length > 0, {
      message: 'review comments must be non-empty strings'
    }))
    .min(1, { message: 'review_comments must contain at least one comment' }),
  language: z.string().trim().min(1).optional()
});

/**
 * Validate an already-parsed JSON value and convert it into a frozen ReviewInput.
 */
export function parseReviewInput(data: unknown, filePath: string = '<inline>'): ReviewInput {
  const result = ReviewInputFileSchema.safeParse(data);

  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new InputError(
      `Input JSON must contain a 'code_snippet' string and a non-empty 'review_comments' list (${issues.join('; ')})`,
      filePath
    );
  }

  const { code_snippet, review_comments, language } = result.data;

  return Object.freeze({
    codeSnippet: code_snippet,
    comments: Object.freeze(review_comments.map((comment) => comment.trim())),
    ...(language ? { language } : {})
  });
}

export async function loadReviewInput(filePath: string): Promise<ReviewInput> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    appLogger.input('read', { filePath, success: false, error: cause?.message });
    throw new InputError(`Input file not found or unreadable at ${filePath}`, filePath, cause);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    appLogger.input('parse', { filePath, success: false, error: cause?.message });
    throw new InputError(`Invalid JSON format in file ${filePath}`, filePath, cause);
  }

  try {
    const input = parseReviewInput(parsed, filePath);
    appLogger.input('validate', { filePath, success: true, commentsCount: input.comments.length });
    return input;
  } catch (error) {
    appLogger.input('validate', {
      filePath,
      success: false,
      error: error instanceof Error ? error.message : String(error)
    });
    throw error;
  }
}
