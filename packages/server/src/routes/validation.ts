import type { ZodError } from 'zod';
import { AuthError } from '../errors/auth-error.js';

/**
 * `zValidator` hook that turns a failed parse into an `invalid_request`
 */
export function rejectInvalid(result: { success: true } | { success: false; error: ZodError }): void {
  if (!result.success) {
    throw AuthError.invalidRequest(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join(', ')
    );
  }
}
