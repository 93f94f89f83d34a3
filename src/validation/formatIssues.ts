import type { z } from 'zod';

export function formatValidationIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((i) => {
      const path = i.path.map((seg) => String(seg));
      return path.length > 0 ? `- ${path.join('.')} :: ${i.message}` : `- ${i.message}`;
    })
    .join('\n');
}
