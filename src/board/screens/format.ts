/**
 * Display formatting for dashboard values
 */

const BYTE_UNITS = ['B', 'KiB', 'MiB', 'GiB', 'TiB'] as const;

export function formatBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes <= 0) return '0 B';
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} B` : `${value.toFixed(1)} ${BYTE_UNITS[unit] ?? 'B'}`;
}

export function formatFrequency(hz: number): string {
  if (!Number.isFinite(hz) || hz <= 0) return '-';
  if (hz >= 1_000_000_000) return `${(hz / 1_000_000_000).toFixed(2)} GHz`;
  return `${Math.round(hz / 1_000_000)} MHz`;
}

export function formatPercent(percent: number): string {
  return `${Math.round(Number.isFinite(percent) ? percent : 0)}%`;
}

export function formatCelsius(celsius: number): string {
  return `${celsius.toFixed(1)}°C`;
}

export function formatMilliwatts(milliwatts: number): string {
  return milliwatts >= 1000 ? `${(milliwatts / 1000).toFixed(2)} W` : `${Math.round(milliwatts)} mW`;
}

export function formatWatts(watts: number): string {
  return `${watts.toFixed(2)} W`;
}

export function usedShare(used: number, total: number): number {
  return total > 0 ? Math.min(100, (used / total) * 100) : 0;
}
