/**
 * "45s", "3m", "3m 20s", "2h", "2h 5m". Zero sub-units are omitted.
 */
export function formatDuration(seconds: number): string {
  const totalSeconds = Math.max(0, Math.floor(seconds));
  if (totalSeconds < 60) {
    return `${totalSeconds}s`;
  }

  const minutes = Math.floor(totalSeconds / 60);
  const secs = totalSeconds % 60;
  if (minutes < 60) {
    return secs > 0 ? `${minutes}m ${secs}s` : `${minutes}m`;
  }

  const hours = Math.floor(minutes / 60);
  const remainingMinutes = minutes % 60;
  return remainingMinutes > 0 ? `${hours}h ${remainingMinutes}m` : `${hours}h`;
}

/**
 * Trim, then cut to `maxLength` characters with a trailing "..."
 */
export function truncateTitle(title: string, maxLength = 50): string {
  const cleaned = title.trim();
  const chars = Array.from(cleaned);
  if (chars.length <= maxLength) {
    return cleaned;
  }
  return chars.slice(0, maxLength).join('') + '...';
}
