/**
 * CLI Formatter for cmdcore
 *
 * Renders sink messages for terminal display.
 */

import chalk from "chalk";
import { MessageLevel, OutputSink } from "../../core/types.js";

// ============================================================================
// Terminal Output Helpers
// ============================================================================

export const output = {
  header(text: string): void {
    console.log();
    console.log(chalk.bold.cyan(`━━━ ${text.toUpperCase()} ━━━`));
    console.log();
  },

  subheader(text: string): void {
    console.log(chalk.bold(text));
  },

  success(text: string): void {
    console.log(chalk.green(`✓ ${text}`));
  },

  error(text: string): void {
    console.log(chalk.red(`✗ ${text}`));
  },

  warning(text: string): void {
    console.log(chalk.yellow(`⚠ ${text}`));
  },

  info(text: string): void {
    console.log(chalk.blue(`ℹ ${text}`));
  },

  dim(text: string): void {
    console.log(chalk.dim(text));
  },

  plain(text: string): void {
    console.log(text);
  },

  blank(): void {
    console.log();
  },
};

// ============================================================================
// Sink
// ============================================================================

/**
 * Render one message. Info messages and framed reports are printed as is.
 */
export function renderMessage(message: string, level: MessageLevel): void {
  switch (level) {
    case "success":
      output.success(message);
      break;
    case "error":
      output.error(message);
      break;
    case "warning":
      output.warning(message);
      break;
    case "dim":
      output.dim(message);
      break;
    case "info":
      output.plain(message);
      break;
  }
}

export class TerminalSink implements OutputSink {
  write(message: string, level: MessageLevel): void {
    renderMessage(message, level);
  }
}
