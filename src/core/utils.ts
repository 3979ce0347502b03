const SIZE_UNITS = ['KB', 'MB', 'GB'] as const

/** Human-readable archive size, e.g. `1.5 KB`. */
export function formatSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`
  }

  let value = bytes / 1024
  let unit = 0
  while (value >= 1024 && unit < SIZE_UNITS.length - 1) {
    value /= 1024
    unit++
  }

  return `${value.toFixed(1)} ${SIZE_UNITS[unit]}`
}

/** Human-readable build duration, e.g. `2.5s` or `2m 5s`. */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`
  }

  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`
  }

  const totalSeconds = Math.round(ms / 1000)
  return `${Math.floor(totalSeconds / 60)}m ${totalSeconds % 60}s`
}
