/**
 * Terminal output for the sqlchat CLI.
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import boxen from 'boxen';

export function printBanner(): void {
  console.log(
    boxen(`${chalk.bold.cyan('sqlchat')}\n${chalk.gray('chat with your SQLite data')}`, {
      padding: { top: 0, bottom: 0, left: 2, right: 2 },
      borderStyle: 'round',
      borderColor: 'cyan',
    })
  );
}

export function success(message: string): void {
  console.log(`${chalk.green('✔')} ${message}`);
}

export function error(message: string, suggestion?: string): void {
  console.log(`${chalk.red('✖')} ${message}`);
  if (suggestion) {
    console.log(`  ${chalk.yellow('→')} ${chalk.dim(suggestion)}`);
  }
}

export function warn(message: string): void {
  console.log(`${chalk.yellow('⚠')} ${message}`);
}

export function info(message: string): void {
  console.log(`${chalk.blue('ℹ')} ${message}`);
}

export function spinner(text: string): Ora {
  return ora({
    text,
    color: 'cyan',
    spinner: 'dots',
  }).start();
}

export function successBox(message: string, title?: string): void {
  console.log(
    boxen(chalk.green(message), {
      padding: 1,
      margin: 1,
      borderStyle: 'round',
      borderColor: 'green',
      title,
      titleAlignment: 'center',
    })
  );
}

export function code(content: string, language?: string): void {
  const border = chalk.gray('─'.repeat(50));
  console.log(border);
  if (language) {
    console.log(chalk.gray(`# ${language}`));
  }
  console.log(chalk.cyan(content));
  console.log(border);
}

export function section(title: string): void {
  console.log('');
  console.log(chalk.bold.cyan(`▶ ${title}`));
  console.log(chalk.gray('─'.repeat(50)));
}

export function newline(): void {
  console.log('');
}

/**
 * One labelled value; red cross when `ok` is false.
 */
export function row(label: string, value: string, ok: boolean = true): void {
  const icon = ok ? chalk.green('✔') : chalk.red('✖');
  console.log(`  ${icon} ${chalk.bold(label)}: ${chalk.cyan(value)}`);
}
