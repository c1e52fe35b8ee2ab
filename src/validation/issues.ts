import type { z } from 'zod';

/**
 * zod 이슈를 한 줄짜리 설명으로 합칩니다.
 */
export function formatValidationIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
