/**
 * Timestamp helpers. Credential timestamps are whole seconds since the Unix
 * epoch (UTC).
 */

export const nowSeconds = (): number => {
  return Math.floor(Date.now() / 1000);
};

const pad = (n: number): string => n.toString().padStart(2, '0');

/**
 * Format a Unix timestamp (seconds) as `YYYY-MM-DD HH:MM:SS` in local time
 */
export const formatTimestampLocal = (timestamp: number): string => {
  const date = new Date(timestamp * 1000);
  if (!Number.isFinite(timestamp) || Number.isNaN(date.getTime())) {
    return `Invalid timestamp: ${timestamp}`;
  }

  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
};

export const formatTimestampIso = (timestamp: number): string => {
  const date = new Date(timestamp * 1000);
  if (!Number.isFinite(timestamp) || Number.isNaN(date.getTime())) {
    return `Invalid timestamp: ${timestamp}`;
  }
  return date.toISOString().replace(/\.000Z$/, 'Z');
};

export const formatTimestamp = (timestamp: number, format: 'local' | 'iso' = 'local'): string => {
  return format === 'iso' ? formatTimestampIso(timestamp) : formatTimestampLocal(timestamp);
};
