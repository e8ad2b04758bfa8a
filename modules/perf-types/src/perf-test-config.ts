import { z } from 'zod'

export const PerfTestConfig = z
  .object({
    perftestId: z.string().min(1).describe('The identifier of this performance test'),
    revisionsToGoBack: z
      .number()
      .int()
      .positive()
      .describe('The maximum number of revisions to go back when testing'),
    iterationsPerDiff: z.number().int().positive().describe('The number of clean build iterations per revision'),
    targetsToBuild: z.string().min(1).array().nonempty().describe('The targets to build'),
    repoUnderTest: z.string().min(1).describe('Absolute path to the repo under test'),
    projectUnderTest: z.string().describe('Path to the project folder being tested, relative to the repo'),
    pathToBuck: z.string().min(1).describe('The path to the buck binary'),
    oldBuckRevision: z.string().min(1).describe('The original buck revision'),
    newBuckRevision: z.string().min(1).describe('The new buck revision'),
  })
  .strict()
export type PerfTestConfig = Readonly<z.infer<typeof PerfTestConfig>>
