import chalk from "chalk";

export const ui = {
  brand: chalk.hex("#0EA5E9"),
  success: chalk.green,
  error: chalk.red,
  warn: chalk.yellow,
  dim: chalk.dim,
  bold: chalk.bold,
  label: chalk.cyan,
  value: chalk.white,
  muted: chalk.gray,
  header: chalk.bold.hex("#0EA5E9"),
};

export function banner(): string {
  return `${ui.header("vidatlas")} ${ui.dim("incremental transcript knowledge")}`;
}

export function formatLabel(label: string, value: string): string {
  return ui.label(`${label}:`) + " " + ui.value(value);
}

export function formatError(text: string): string {
  return ui.error("error") + " " + text;
}

export function formatWarn(text: string): string {
  return ui.warn("warning") + " " + text;
}

export function formatSuccess(text: string): string {
  return ui.success("ok") + " " + text;
}

export function progressBar(percent: number, width = 24): string {
  const clamped = Math.max(0, Math.min(100, percent));
  const filled = Math.round((clamped / 100) * width);
  return ui.brand("█".repeat(filled)) + ui.muted("░".repeat(width - filled));
}
