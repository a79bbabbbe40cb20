import path from 'node:path'
import { AnalysisStatus } from '../domain/enums.js'
import type { BatchResult } from '../domain/types.js'
import { DocumentAnalyzer } from '../services/analysis/document.analyzer.js'
import { StorageService } from '../services/storage.service.js'
import { generateStructuredXml, serializeXml } from '../services/structure/structured-xml.generator.js'
import { ThesisPipeline, SUMMARY_OBJECT_PATH } from '../services/tasks/thesis.pipeline.js'
import { errorMessage } from '../utils/errors.js'

export const USAGE = [
  'Usage:',
  '  thesis-structure analyze <xmlDir> [outJson]',
  '  thesis-structure process <pdfDir> [outDir]'
].join('\n')

const DEFAULT_OUTPUT_DIR = process.env.LOCAL_STORAGE_ROOT ?? 'output'

type Writer = (line: string) => void

export type CliDeps = {
  analyzer?: DocumentAnalyzer
  createStorage?: (localRoot: string) => StorageService
  createPipeline?: (storage: StorageService) => Pick<ThesisPipeline, 'run'>
  stdout?: Writer
  stderr?: Writer
}

const stemOf = (file: string): string => path.basename(file, path.extname(file))

const summarize = (batch: BatchResult): string =>
  `${batch.total} file(s): ${batch.succeeded} succeeded, ${batch.failed} failed`

const runAnalyze = async (xmlDir: string, outJson: string, deps: Required<CliDeps>): Promise<BatchResult> => {
  const batch = await deps.analyzer.analyzeDirectory(xmlDir)
  const storage = deps.createStorage(path.dirname(outJson))

  for (const result of batch.results) {
    if (result.status !== AnalysisStatus.SUCCESS) continue
    await storage.putXml(`${stemOf(result.file)}_structured.xml`, serializeXml(generateStructuredXml(result)))
  }
  const written = await storage.putJson(path.basename(outJson), batch)
  deps.stdout(`wrote ${written}`)
  return batch
}

const runProcess = async (pdfDir: string, outDir: string, deps: Required<CliDeps>): Promise<BatchResult> => {
  const storage = deps.createStorage(outDir)
  const batch = await deps.createPipeline(storage).run(pdfDir)
  deps.stdout(`wrote ${storage.describe(SUMMARY_OBJECT_PATH)}`)
  return batch
}

/** Runs one CLI command and resolves to the process exit code. */
export const runCli = async (argv: string[], deps: CliDeps = {}): Promise<number> => {
  const stdout = deps.stdout ?? ((line: string) => process.stdout.write(`${line}\n`))
  const stderr = deps.stderr ?? ((line: string) => process.stderr.write(`${line}\n`))

  const [command, input, output] = argv
  if (!command || !input || (command !== 'analyze' && command !== 'process')) {
    stderr(USAGE)
    return 1
  }

  try {
    const resolved: Required<CliDeps> = {
      analyzer: deps.analyzer ?? new DocumentAnalyzer(),
      createStorage: deps.createStorage ?? ((localRoot) => new StorageService({ localRoot })),
      createPipeline: deps.createPipeline ?? ((storage) => new ThesisPipeline({ storage })),
      stdout,
      stderr
    }
    const batch =
      command === 'analyze'
        ? await runAnalyze(input, output ?? path.join(DEFAULT_OUTPUT_DIR, SUMMARY_OBJECT_PATH), resolved)
        : await runProcess(input, output ?? DEFAULT_OUTPUT_DIR, resolved)

    for (const warning of batch.warnings) {
      stderr(`warning: ${warning}`)
    }
    stdout(summarize(batch))
    return 0
  } catch (error) {
    stderr(`error: ${errorMessage(error)}`)
    return 1
  }
}
