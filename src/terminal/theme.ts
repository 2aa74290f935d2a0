import chalk from "chalk";

export const theme = {
  heading: (value: string) => chalk.bold.cyan(value),
  success: (value: string) => chalk.green(value),
  warn: (value: string) => chalk.yellow(value),
  error: (value: string) => chalk.red(value),
  muted: (value: string) => chalk.gray(value),
};

export type Theme = typeof theme;

/** Identity theme for plain-text output (pipes, JSON logs, tests). */
export const plainTheme: Theme = {
  heading: (value) => value,
  success: (value) => value,
  warn: (value) => value,
  error: (value) => value,
  muted: (value) => value,
};
