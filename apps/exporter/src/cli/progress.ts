const FILLED = '█'
const EMPTY = '░'

/**
 * `Progress: |████░░░░| 2/4 (50.0%)`
 */
export function renderProgressBar(current: number, total: number, barLength = 40): string {
  const ratio = total > 0 ? Math.min(current / total, 1) : 1
  const filled = Math.floor(barLength * ratio)
  const bar = FILLED.repeat(filled) + EMPTY.repeat(barLength - filled)
  return `Progress: |${bar}| ${current}/${total} (${(ratio * 100).toFixed(1)}%)`
}

export interface ProgressStream {
  isTTY?: boolean
  write(chunk: string): boolean
}

/**
 * Redraws the bar in place on a terminal; stays silent otherwise so
 * piped output and log files are not cluttered.
 */
export function createProgressReporter(
  stream: ProgressStream
): (processed: number, total: number) => void {
  return (processed, total) => {
    if (!stream.isTTY) return
    stream.write(`\r${renderProgressBar(processed, total)}`)
    if (processed >= total) {
      stream.write('\n')
    }
  }
}
