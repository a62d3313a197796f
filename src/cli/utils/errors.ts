import chalk from 'chalk';
import { CertAdminError } from '../../lib/index.js';

/** Central error handler for CLI commands. */
export function handleError(error: unknown): void {
  if (error instanceof Error) {
    console.error(chalk.red('Error:'), error.message);
    // our own errors carry a readable message; anything else may need the stack
    if (!(error instanceof CertAdminError) && process.env.CERTADM_TRACE && error.stack) {
      console.error(chalk.gray(error.stack));
    }
  } else {
    console.error('Unknown error:', error);
  }
}
