const UNITS = ['B', 'K', 'M', 'G', 'T'];

/**
 * Human-readable size in the style of `du -h`
 */
export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }

  if (unit === 0) {
    return `${value}${UNITS[unit]}`;
  }
  return `${value < 10 ? value.toFixed(1) : Math.round(value)}${UNITS[unit]}`;
}

export function formatAge(ageMs: number | null): string {
  if (ageMs === null) {
    return 'unknown';
  }

  const hours = Math.floor(ageMs / 3_600_000);
  if (hours < 1) {
    return '< 1 hour';
  }
  if (hours < 24) {
    return `${hours} hours`;
  }
  return `${Math.floor(hours / 24)} days`;
}
