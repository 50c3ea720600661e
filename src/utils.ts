/**
 * Format a step timing line: milliseconds under one second, seconds above
 * @param label - Step label, padded to 22 characters
 * @param durationMs - Elapsed time
 */
export function formatDuration(label: string, durationMs: number): string {
  const seconds = durationMs / 1000;
  const value = seconds < 1
    ? `${durationMs.toFixed(2).padStart(8)} ms`
    : `${seconds.toFixed(2).padStart(8)} s`;
  return `   ${label.padEnd(22)}: ${value}`;
}

/**
 * Join file paths for an action output, one per line
 */
export function formatFileList(files: string[]): string {
  return files.join('\n');
}
