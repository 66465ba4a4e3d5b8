import fs from 'fs'
import path from 'path'
import { z } from 'zod'
import { EvolveConfig } from '../contracts/types'
import { EvolveConfigSchema } from '../contracts/schemas'

export class ConfigLoader {
  private static readonly DEFAULT_CONFIG: EvolveConfig = {
    scan: {
      parallel: true,
      workers: 4,
      parallelThreshold: 10,
    },
    attribution: {
      ignoreWhitespace: true,
    },
    report: {
      breakdownLimit: 20,
    },
  }

  static readonly CONFIG_NAMES = ['.git-evolve.config.json', 'git-evolve.config.json']

  private readonly config: EvolveConfig

  constructor(private configPath?: string, private startDir: string = process.cwd()) {
    this.config = this.loadConfig()
  }

  private findConfigFile(): string | null {
    // Start from the working directory and walk up
    let currentDir = path.resolve(this.startDir)

    while (true) {
      for (const configName of ConfigLoader.CONFIG_NAMES) {
        const configPath = path.join(currentDir, configName)
        if (fs.existsSync(configPath)) {
          return configPath
        }
      }
      const parentDir = path.dirname(currentDir)
      if (parentDir === currentDir) {
        return null
      }
      currentDir = parentDir
    }
  }

  private loadConfig(): EvolveConfig {
    const configPath = this.configPath ?? this.findConfigFile()
    if (!configPath || !fs.existsSync(configPath)) {
      return ConfigLoader.DEFAULT_CONFIG
    }

    const contents = readJson(configPath)
    if (contents === undefined) {
      return ConfigLoader.DEFAULT_CONFIG
    }

    const result = EvolveConfigSchema.safeParse(contents)
    if (!result.success) {
      console.error(`Invalid config at ${configPath}: ${describeIssues(result.error)}`)
      return ConfigLoader.DEFAULT_CONFIG
    }
    return result.data
  }

  getConfig(): EvolveConfig {
    return this.config
  }
}

function readJson(configPath: string): unknown {
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'))
    return parsed
  } catch (error) {
    if (error instanceof SyntaxError) {
      console.error(`Invalid JSON in config file ${configPath}`)
    } else {
      console.error(`Error loading config from ${configPath}:`, error)
    }
    return undefined
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ')
}
