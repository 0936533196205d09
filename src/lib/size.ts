/**
 * Size Utilities
 *
 * Parsing of human size strings ("5G", "500M", "10GB") and formatting of
 * byte counts.
 */

const KB = 1024;
const MB = KB * 1024;
const GB = MB * 1024;
const TB = GB * 1024;

const MULTIPLIERS: Record<string, number> = {
  '': 1,
  K: KB,
  M: MB,
  G: GB,
  T: TB,
};

const SIZE_PATTERN = /^([0-9]+(?:\.[0-9]+)?)\s*([KMGT])?B?$/i;

/**
 * Parse a size string into bytes.
 *
 * @returns Number of bytes, or null when the string is not a size
 */
export function parseSize(size: string): number | null {
  const trimmed = size.trim();
  if (trimmed.length === 0 || trimmed.length > 20) {
    return null;
  }
  const match = SIZE_PATTERN.exec(trimmed);
  if (!match) {
    return null;
  }
  const value = Number.parseFloat(match[1] ?? '');
  const unit = (match[2] ?? '').toUpperCase();
  const multiplier = MULTIPLIERS[unit];
  if (Number.isNaN(value) || multiplier === undefined) {
    return null;
  }
  return Math.floor(value * multiplier);
}

/**
 * Format a byte count for display (e.g. 1536 -> "1KB", 5 GiB -> "5.0GB").
 */
export function formatBytes(bytes: number): string {
  if (bytes < KB) {
    return `${bytes}B`;
  }
  if (bytes < MB) {
    return `${Math.floor(bytes / KB)}KB`;
  }
  if (bytes < GB) {
    return `${Math.floor(bytes / MB)}MB`;
  }
  if (bytes < TB) {
    return `${(bytes / GB).toFixed(1)}GB`;
  }
  return `${(bytes / TB).toFixed(1)}TB`;
}
