const SUFFIXES = ['B', 'KB', 'MB', 'GB', 'TB']

/**
 * Formats a byte count with the largest unit that keeps it at or above one, e.g. 4096 => "4 KB".
 * Each step divides by 1024 and drops the fraction, so 1536 => "1 KB".
 */
export const humanReadableSize = (bytes: number) => {
  let i = 0
  while (bytes >= 1024 && i < SUFFIXES.length - 1) {
    bytes = Math.floor(bytes / 1024)
    i++
  }

  return `${bytes} ${SUFFIXES[i]}`
}

export const shortId = (id: string, length = 6) => id.slice(0, length)
