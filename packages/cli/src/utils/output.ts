/**
 * Console output helpers
 *
 * Messages go to stderr so previews on stdout stay pipeable.
 */

import pc from "picocolors";

const symbols = {
  info: "ℹ",
  success: "✓",
  warning: "⚠",
  error: "✗",
};

export const colors = {
  bold: pc.bold,
  dim: pc.dim,
};

export function info(message: string): void {
  console.error(pc.blue(`${symbols.info} ${message}`));
}

export function success(message: string): void {
  console.error(pc.green(`${symbols.success} ${message}`));
}

export function warning(message: string): void {
  console.error(pc.yellow(`${symbols.warning} ${message}`));
}

export function error(message: string): void {
  console.error(pc.red(`${symbols.error} Error: ${message}`));
}

export function dim(message: string): void {
  console.error(pc.dim(message));
}

export function header(message: string): void {
  console.error(pc.bold(pc.cyan(message)));
}

/**
 * Print lines to stdout
 */
export function print(lines: readonly string[]): void {
  for (const line of lines) {
    console.log(line);
  }
}
