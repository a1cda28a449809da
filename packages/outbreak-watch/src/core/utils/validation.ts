import type { ZodError } from 'zod';

/**
 * First validation issue as `path.to.field: message`
 */
export function formatZodError(error: ZodError): string {
  const issue = error.errors[0];
  if (!issue) return 'validation failed';
  const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
  return `${path}${issue.message}`;
}
