// "<commit> <original line> <final line>[ <lines in group>]", SHA-1 or SHA-256 ids
const HEADER_PATTERN = /^([0-9a-f]{40}|[0-9a-f]{64}) \d+ \d+(?: \d+)?$/

export interface BlameLineCounts {
  totalLines: number
  /** Lines whose last change is exactly the given commit. */
  attributedLines: number
}

/**
 * Parse the commit id out of a porcelain header line, or null for any other line
 */
export function parseHeaderCommit(line: string): string | null {
  const match = HEADER_PATTERN.exec(line)
  return match ? match[1] : null
}

/**
 * Count content lines in `git blame --porcelain` output, and how many of
 * them are attributed to `commitId`.
 *
 * Metadata lines (author, summary, filename, boundary, ...) never change
 * the current commit; only header lines do. The comparison is on the full
 * id, so two commits sharing a short prefix are never confused.
 */
export function countAttributedLines(output: string, commitId: string): BlameLineCounts {
  const target = commitId.toLowerCase()
  let currentCommit: string | null = null
  let totalLines = 0
  let attributedLines = 0

  for (const line of output.split('\n')) {
    if (line.startsWith('\t')) {
      totalLines++
      if (currentCommit === target) {
        attributedLines++
      }
      continue
    }

    const header = parseHeaderCommit(line)
    if (header) {
      currentCommit = header
    }
  }

  return { totalLines, attributedLines }
}
