/**
 * Formatting utilities for durations, progress bars and tables
 */

/**
 * Format duration in hours, minutes, and seconds
 */
export function formatDuration(seconds: number): string {
  if (seconds < 60) {
    return `${seconds < 10 ? seconds.toFixed(1) : Math.round(seconds)} seconds`;
  } else if (seconds < 3600) {
    const minutes = Math.floor(seconds / 60);
    const remainingSeconds = Math.round(seconds % 60);
    return `${minutes} min ${remainingSeconds} sec`;
  } else {
    const hours = Math.floor(seconds / 3600);
    const minutes = Math.floor((seconds % 3600) / 60);
    const remainingSeconds = Math.round(seconds % 60);
    return `${hours} hr ${minutes} min ${remainingSeconds} sec`;
  }
}

/**
 * Create a visual progress bar for a completed/total pair
 */
export function createProgressBar(
  completed: number,
  total: number,
  width: number = 20
): string {
  const ratio = total > 0 ? Math.min(1, Math.max(0, completed / total)) : 1;
  const filled = Math.round(ratio * width);
  return "▓".repeat(filled) + "░".repeat(width - filled);
}

export function formatPercent(completed: number, total: number): string {
  const ratio = total > 0 ? completed / total : 1;
  return `${(ratio * 100).toFixed(1)}%`;
}

/**
 * Pad cells into fixed-width columns; the last column is not padded
 */
export function formatRow(cells: string[], widths: number[]): string {
  return cells
    .map((cell, i) => {
      const width = widths[i];
      if (width === undefined) return cell;
      const clipped = cell.length > width - 1 ? cell.slice(0, width - 1) : cell;
      return clipped.padEnd(width);
    })
    .join("")
    .trimEnd();
}
