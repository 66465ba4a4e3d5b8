/**
 * The three git capabilities the analysis depends on, plus locating the
 * repository. Implemented over the git binary by {@link GitVersionControl};
 * tests provide an in-memory fake.
 */
export interface VersionControl {
  /** Absolute path of the working tree root. Throws EnvironmentError outside a repository. */
  repositoryRoot(): Promise<string>

  /** Full canonical commit id for a hash, tag, branch or relative reference. */
  resolveReference(reference: string, repoRoot: string): Promise<string>

  /** Tracked file paths relative to the root, in git's order. */
  listTrackedFiles(repoRoot: string): Promise<string[]>

  /** Raw porcelain blame output for one file. Rejects when git fails for that file. */
  attributeFile(filePath: string, repoRoot: string, options?: AttributeFileOptions): Promise<string>
}

export interface AttributeFileOptions {
  signal?: AbortSignal
}
