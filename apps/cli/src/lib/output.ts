/**
 * Output Formatter
 *
 * Operator-facing console lines, each stamped with the local time.
 */

import chalk from 'chalk';

function stamp(): string {
  return chalk.gray(`[${new Date().toLocaleTimeString('en-GB', { hour12: false })}]`);
}

export function printSuccess(message: string): void {
  console.log(stamp(), chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(stamp(), chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(stamp(), chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(stamp(), chalk.blue('i'), message);
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: string | number): void {
  console.log(`  ${chalk.gray(key + ':')} ${value}`);
}
