import type { ZodError } from 'zod';
import { formatValidationErrors, printError } from '../formatter.js';

/**
 * Print zod option errors the way every command reports them.
 */
export function printOptionErrors(error: ZodError): void {
  printError(
    formatValidationErrors(
      error.errors.map((e) => ({
        path: e.path.join('.'),
        message: e.message,
      }))
    )
  );
  process.exitCode = 1;
}
