import { describe, it, expect, vi } from 'vitest'
import { EvolutionAnalyzer } from './EvolutionAnalyzer'
import { MemoryVersionControl, MemoryRepository } from '../git/MemoryVersionControl'
import { EvolveConfig } from '../contracts'
import { EnvironmentError, InterruptedError, InvalidReferenceError } from '../errors'

const BASE = 'a1'.repeat(20)
const LATER = 'b2'.repeat(20)

const config: EvolveConfig = {
  scan: { parallel: true, workers: 4, parallelThreshold: 10 },
  attribution: { ignoreWhitespace: true },
  report: { breakdownLimit: 20 },
}

function lines(base: number, later: number): string[] {
  return [...Array<string>(base).fill(BASE), ...Array<string>(later).fill(LATER)]
}

function createAnalyzer(repository: MemoryRepository | null, onWarning = vi.fn()) {
  const versionControl = new MemoryVersionControl(repository)
  return {
    versionControl,
    onWarning,
    analyzer: new EvolutionAnalyzer({ versionControl, config, onWarning }),
  }
}

describe('EvolutionAnalyzer', () => {
  it('should report the two-file scenario', async () => {
    const { analyzer } = createAnalyzer({
      root: '/work/my-project',
      refs: { 'v1.0.0': BASE },
      files: {
        'a.ts': { commits: lines(40, 60) },
        'b.ts': { commits: lines(50, 0) },
      },
    })

    const summary = await analyzer.analyze({ base: 'v1.0.0' })

    expect(summary).toEqual({
      baseCommitFullId: BASE,
      totalLines: 150,
      baseLinesSurviving: 90,
      evolvedLines: 60,
      evolutionPercent: 40,
      survivalPercent: 60,
      filesAnalyzed: 2,
      repositoryName: 'my-project',
    })
  })

  it('should short-circuit when no files are tracked', async () => {
    const { analyzer, versionControl } = createAnalyzer({
      root: '/work/empty',
      refs: { HEAD: BASE },
      files: {},
    })

    const summary = await analyzer.analyze({ base: 'HEAD', fileBreakdown: true })

    expect(summary.diagnostic).toBe('no-tracked-files')
    expect(summary.evolutionPercent).toBe(0)
    expect(summary.filesAnalyzed).toBe(0)
    expect(versionControl.attributeCalls).toEqual([])
  })

  it('should fail with EnvironmentError outside a repository', async () => {
    const { analyzer } = createAnalyzer(null)

    await expect(analyzer.analyze({ base: 'HEAD' })).rejects.toBeInstanceOf(EnvironmentError)
  })

  it('should fail with InvalidReferenceError before reading any file', async () => {
    const { analyzer, versionControl } = createAnalyzer({
      root: '/work/project',
      refs: {},
      files: { 'a.ts': { commits: lines(1, 0) } },
    })

    await expect(analyzer.analyze({ base: 'missing' })).rejects.toBeInstanceOf(InvalidReferenceError)
    expect(versionControl.attributeCalls).toEqual([])
  })

  it('should absorb per-file failures as zero lines with a warning', async () => {
    const { analyzer, onWarning } = createAnalyzer({
      root: '/work/project',
      refs: { HEAD: BASE },
      files: {
        'a.ts': { commits: lines(3, 1) },
        'image.png': { error: 'fatal: binary' },
      },
    })

    const summary = await analyzer.analyze({ base: 'HEAD', fileBreakdown: true })

    expect(summary.totalLines).toBe(4)
    expect(summary.baseLinesSurviving).toBe(3)
    expect(summary.filesAnalyzed).toBe(2)
    expect(summary.fileBreakdown).toEqual([
      { path: 'a.ts', totalLines: 4, evolvedLines: 1, evolutionPercent: 25 },
    ])
    expect(onWarning).toHaveBeenCalledWith('Failed to analyze image.png: fatal: binary')
  })

  it('should give the same summary in parallel and serial mode', async () => {
    const files: MemoryRepository['files'] = {}
    for (let i = 0; i < 25; i++) {
      files[`src/module${i}.ts`] = { commits: lines(i, 25 - i), delayMs: (25 - i) % 7 }
    }
    const repository = { root: '/work/big', refs: { main: BASE }, files }

    const parallel = await createAnalyzer(repository).analyzer
      .analyze({ base: 'main', fileBreakdown: true, parallel: true, workers: 6 })
    const serial = await createAnalyzer(repository).analyzer
      .analyze({ base: 'main', fileBreakdown: true, parallel: false })

    expect(parallel).toEqual(serial)
    expect(parallel.fileBreakdown).toHaveLength(20)
    expect(parallel.fileBreakdown?.[0].path).toBe('src/module0.ts')
    expect(parallel.fileBreakdown?.[19].path).toBe('src/module19.ts')
  })

  it('should use the configured worker count unless overridden', async () => {
    const files: MemoryRepository['files'] = {}
    for (let i = 0; i < 12; i++) {
      files[`f${i}.ts`] = { commits: lines(1, 1), delayMs: 3 }
    }
    const first = createAnalyzer({ root: '/r', refs: { HEAD: BASE }, files })
    const second = createAnalyzer({ root: '/r', refs: { HEAD: BASE }, files })

    await first.analyzer.analyze({ base: 'HEAD' })
    await second.analyzer.analyze({ base: 'HEAD', workers: 2 })

    expect(first.versionControl.maxInFlight).toBe(4)
    expect(second.versionControl.maxInFlight).toBe(2)
  })

  it('should reject invalid options', async () => {
    const { analyzer } = createAnalyzer({ root: '/r', refs: {}, files: {} })

    await expect(analyzer.analyze({ base: 'HEAD', workers: 0 })).rejects.toThrow(
      'Invalid option workers: Number must be greater than 0'
    )
    await expect(analyzer.analyze({ base: '  ' })).rejects.toThrow(InvalidReferenceError)
    await expect(analyzer.analyze({ base: '' })).rejects.toThrow(
      'Cannot resolve base reference "": must not be empty'
    )
  })

  it('should stop with InterruptedError when aborted', async () => {
    const controller = new AbortController()
    controller.abort()
    const { analyzer } = createAnalyzer({
      root: '/r',
      refs: { HEAD: BASE },
      files: { 'a.ts': { commits: lines(1, 0) } },
    })

    await expect(analyzer.analyze({ base: 'HEAD', signal: controller.signal }))
      .rejects.toBeInstanceOf(InterruptedError)
  })
})
