/**
 * Format bytes to human-readable size
 * Example: 1900000000 → "1.8 GB"
 */
export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let size = bytes;
  let unitIndex = 0;

  while (size >= 1024 && unitIndex < units.length - 1) {
    size /= 1024;
    unitIndex++;
  }

  return `${size.toFixed(1)} ${units[unitIndex]}`;
}

/**
 * Relative size change between two files
 * Example: (2000, 500) → "-75.0%", (1000, 1100) → "+10.0%"
 */
export function formatSizeChange(before: number, after: number): string {
  if (before === 0) return 'n/a';
  const percent = ((after - before) / before) * 100;
  const sign = percent > 0 ? '+' : percent < 0 ? '-' : '';
  return `${sign}${Math.abs(percent).toFixed(1)}%`;
}

/**
 * Plural helper for summary lines
 * Example: (1, 'file') → "1 file", (3, 'file') → "3 files"
 */
export function formatCount(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
