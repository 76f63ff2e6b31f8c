export function formatSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`
  }

  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`
  }

  if (bytes < 1024 * 1024 * 1024) {
    return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
  }

  if (bytes < 1024 ** 4) {
    return `${(bytes / (1024 * 1024 * 1024)).toFixed(1)} GB`
  }

  return `${(bytes / 1024 ** 4).toFixed(1)} TB`
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`
  }

  const seconds = ms / 1000
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`
  }

  const minutes = Math.floor(seconds / 60)
  const remainingSeconds = Math.round(seconds % 60)
  return `${minutes}m ${remainingSeconds}s`
}

/**
 * Parses a comma-separated list of 1-based indexes ("1,3").
 * @returns undefined when an entry is not a positive integer
 */
export function parseIndexList(value: string): number[] | undefined {
  const entries = value.split(',').map(entry => entry.trim()).filter(Boolean)
  const indexes: number[] = []
  for (const entry of entries) {
    if (!/^\d+$/.test(entry)) {
      return undefined
    }

    indexes.push(Number(entry))
  }

  return indexes
}
