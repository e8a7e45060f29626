import type { z } from 'zod';

/**
 * Render every issue of a zod error on its own line, with its path
 */
export function formatZodIssues(label: string, err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}
