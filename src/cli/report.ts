import chalk from 'chalk';
import { InstallerError } from '../core/errors';

/**
 * 에러 메시지와 안내 메시지 출력
 */
export function reportError(error: unknown, context: string): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(`${context}: ${message}`));

  if (error instanceof InstallerError && error.suggestion) {
    console.error(chalk.yellow(`  → ${error.suggestion}`));
  }
}
