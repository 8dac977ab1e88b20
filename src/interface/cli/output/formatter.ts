/**
 * CLI output formatter with picocolors
 */

import pc from 'picocolors';

let colors: ReturnType<typeof pc.createColors> = pc;

/** Switch colors on or off for everything formatted afterwards */
export function configureColors(enabled: boolean): void {
  colors = pc.createColors(enabled);
}

export function formatSuccess(message: string): string {
  return colors.green(`OK ${message}`);
}

export function formatWarning(message: string): string {
  return colors.yellow(`WARN ${message}`);
}

export function formatError(message: string): string {
  return colors.red(`Error: ${message}`);
}

export function formatHint(message: string): string {
  return colors.cyan(`Hint: ${message}`);
}

export function formatDim(text: string): string {
  return colors.dim(text);
}

export function formatBold(text: string): string {
  return colors.bold(text);
}

export function formatHighlight(text: string): string {
  return colors.magenta(text);
}

export function indent(text: string, spaces: number): string {
  const pad = ' '.repeat(spaces);
  return text
    .split('\n')
    .map((line) => pad + line)
    .join('\n');
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}
