import type { z } from 'zod';

/**
 * Format zod issues as `path: message` lines
 */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.') || '_root';
    return `${path}: ${issue.message}`;
  });
}
