import { z } from 'zod'

const positiveInt = z.number().int().positive()

export const EvolveConfigSchema = z.object({
  scan: z.object({
    parallel: z.boolean().default(true),
    workers: positiveInt.default(4),
    parallelThreshold: z.number().int().nonnegative().default(10),
    attributionTimeoutMs: positiveInt.optional(),
  }).default({
    parallel: true,
    workers: 4,
    parallelThreshold: 10,
  }),
  attribution: z.object({
    ignoreWhitespace: z.boolean().default(true),
  }).default({
    ignoreWhitespace: true,
  }),
  report: z.object({
    breakdownLimit: positiveInt.default(20),
  }).default({
    breakdownLimit: 20,
  }),
})

export const AnalyzeOptionsSchema = z.object({
  base: z.string().trim().min(1, 'base reference must not be empty'),
  fileBreakdown: z.boolean().optional(),
  parallel: z.boolean().optional(),
  workers: positiveInt.optional(),
})

// Commander hands option values over as strings
export const WorkerCountSchema = z.coerce.number().int().positive()
