import { FileAttributionResult } from '../contracts'
import { PerFileReadError, errorMessage } from '../errors'
import { VersionControl } from '../git/VersionControl'
import { countAttributedLines } from './BlamePorcelainParser'

export interface AttributionRead {
  result: FileAttributionResult
  /** Present when the read failed and `result` is the zeroed fallback. */
  failure?: PerFileReadError
}

export function zeroedResult(path: string): FileAttributionResult {
  return { path, totalLines: 0, baseAttributedLines: 0 }
}

/**
 * Reads line attribution for one file at a time against a fixed base commit.
 *
 * A failing read (deleted file, binary content, permissions, timeout) yields
 * a zeroed result and a {@link PerFileReadError} instead of a rejection, so a
 * single bad file contributes 0 of 0 lines and the scan carries on.
 */
export class AttributionReader {
  constructor(
    private versionControl: VersionControl,
    private baseCommitId: string,
    private repoRoot: string
  ) {}

  async read(path: string, signal?: AbortSignal): Promise<AttributionRead> {
    try {
      const output = await this.versionControl.attributeFile(path, this.repoRoot, { signal })
      const counts = countAttributedLines(output, this.baseCommitId)
      return {
        result: {
          path,
          totalLines: counts.totalLines,
          baseAttributedLines: counts.attributedLines,
        },
      }
    } catch (error) {
      return {
        result: zeroedResult(path),
        failure: new PerFileReadError(path, errorMessage(error)),
      }
    }
  }
}
