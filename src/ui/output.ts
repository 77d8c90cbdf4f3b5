import chalk from 'chalk';

export const ok = (msg: string) => console.log(chalk.green('✓'), msg);
export const fail = (msg: string) => console.error(chalk.red('✗'), msg);
export const warn = (msg: string) => console.error(chalk.yellow('⚠'), msg);
export const info = (msg: string) => console.log(chalk.blue('ℹ'), msg);

export const heading = (msg: string) => console.log(`\n${chalk.bold(msg)}`);

/** Prints an indented, dimmed list of items under the previous line. */
export function list(items: readonly string[]): void {
  for (const item of items) console.log(`  ${chalk.dim('•')} ${item}`);
}
