import { describe, it, expect, afterEach, vi } from 'vitest'
import { ConfigLoader } from './ConfigLoader'
import fs from 'fs'
import path from 'path'
import os from 'os'

describe('ConfigLoader', () => {
  const testConfigPath = path.join(os.tmpdir(), 'test-git-evolve.config.json')
  let tempDir: string | null = null

  afterEach(() => {
    // Clean up test config file
    if (fs.existsSync(testConfigPath)) {
      fs.unlinkSync(testConfigPath)
    }
    if (tempDir) {
      fs.rmSync(tempDir, { recursive: true, force: true })
      tempDir = null
    }
    vi.restoreAllMocks()
  })

  describe('config loading', () => {
    it('should load default config when no config file exists', () => {
      const loader = new ConfigLoader('/non/existent/path.json')
      const config = loader.getConfig()

      expect(config.scan.parallel).toBe(true)
      expect(config.scan.workers).toBe(4)
      expect(config.scan.parallelThreshold).toBe(10)
      expect(config.scan.attributionTimeoutMs).toBeUndefined()
      expect(config.attribution.ignoreWhitespace).toBe(true)
      expect(config.report.breakdownLimit).toBe(20)
    })

    it('should load and validate config from file', () => {
      const testConfig = {
        scan: {
          parallel: false,
          workers: 8,
          parallelThreshold: 50,
          attributionTimeoutMs: 30000,
        },
        attribution: {
          ignoreWhitespace: false,
        },
        report: {
          breakdownLimit: 5,
        },
      }

      fs.writeFileSync(testConfigPath, JSON.stringify(testConfig))
      const config = new ConfigLoader(testConfigPath).getConfig()

      expect(config).toEqual(testConfig)
    })

    it('should apply defaults for missing config fields', () => {
      fs.writeFileSync(testConfigPath, JSON.stringify({ scan: { workers: 2 } }))
      const config = new ConfigLoader(testConfigPath).getConfig()

      expect(config.scan.workers).toBe(2)
      expect(config.scan.parallel).toBe(true) // default
      expect(config.attribution.ignoreWhitespace).toBe(true) // default
      expect(config.report.breakdownLimit).toBe(20) // default
    })

    it('should fall back to defaults on invalid JSON', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
      fs.writeFileSync(testConfigPath, 'invalid json {')

      const loader = new ConfigLoader(testConfigPath)

      expect(loader.getConfig().scan.workers).toBe(4)
      expect(errorSpy).toHaveBeenCalledWith(`Invalid JSON in config file ${testConfigPath}`)
    })

    it('should reject a non-positive worker count', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
      fs.writeFileSync(testConfigPath, JSON.stringify({ scan: { workers: 0 } }))

      expect(new ConfigLoader(testConfigPath).getConfig().scan.workers).toBe(4)
      expect(errorSpy).toHaveBeenCalledWith(
        `Invalid config at ${testConfigPath}: scan.workers: Number must be greater than 0`
      )
    })

    it('should find a config file in a parent directory', () => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'git-evolve-config-'))
      const nested = path.join(tempDir, 'packages', 'core')
      fs.mkdirSync(nested, { recursive: true })
      fs.writeFileSync(
        path.join(tempDir, '.git-evolve.config.json'),
        JSON.stringify({ report: { breakdownLimit: 3 } })
      )

      const config = new ConfigLoader(undefined, nested).getConfig()

      expect(config.report.breakdownLimit).toBe(3)
    })
  })
})
