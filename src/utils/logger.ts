import chalk from 'chalk';

export type WarningHandler = (message: string) => void;

/** Yellow warning line on stderr. */
export function logWarning(message: string): void {
  console.warn(chalk.yellow(`Warning: ${message}`));
}
