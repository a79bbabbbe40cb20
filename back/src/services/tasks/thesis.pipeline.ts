import { readFile } from 'node:fs/promises'
import path from 'node:path'
import { sanitizePositiveNumber } from '../../config/env.js'
import { AnalysisStatus } from '../../domain/enums.js'
import type { AnalysisResult, BatchResult } from '../../domain/types.js'
import { AppError, ErrorCodes, errorMessage } from '../../utils/errors.js'
import { buildErrorResult, DocumentAnalyzer, summarizeBatch } from '../analysis/document.analyzer.js'
import { GrobidClient } from '../extract/grobid.client.js'
import { discoverFiles, PDF_PATTERNS } from '../files/discovery.js'
import type { DiscoverFiles, DiscoveryPatterns } from '../files/discovery.js'
import { StorageService } from '../storage.service.js'
import { generateStructuredXml, serializeXml } from '../structure/structured-xml.generator.js'
import { parseXml } from '../tei/xml.parser.js'

const GROBID_REQUEST_DELAY_MS = Number(process.env.GROBID_REQUEST_DELAY_MS ?? 1_000)

export const SUMMARY_OBJECT_PATH = 'thesis_analysis.json'

type GrobidPort = Pick<GrobidClient, 'isAlive' | 'processFulltext' | 'processHeader'>
type StoragePort = Pick<StorageService, 'putText' | 'putJson'>

type ThesisPipelineDeps = {
  grobid?: GrobidPort
  analyzer?: DocumentAnalyzer
  storage?: StoragePort
  discoverFiles?: DiscoverFiles
  readFile?: (filePath: string) => Promise<Uint8Array>
  sleep?: (ms: number) => Promise<void>
  delayMs?: number
  patterns?: DiscoveryPatterns
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms))

const fileStem = (filePath: string): string => path.basename(filePath, path.extname(filePath))

/**
 * PDF directory → GROBID TEI → analysis → stored artifacts. Files are processed one at a time
 * so GROBID is never hit concurrently; a failing PDF is recorded and the run moves on.
 */
export class ThesisPipeline {
  private readonly grobid: GrobidPort
  private readonly analyzer: DocumentAnalyzer
  private readonly storage: StoragePort
  private readonly discoverFiles: DiscoverFiles
  private readonly readFile: (filePath: string) => Promise<Uint8Array>
  private readonly sleep: (ms: number) => Promise<void>
  private readonly delayMs: number
  private readonly patterns: DiscoveryPatterns

  constructor(deps: ThesisPipelineDeps = {}) {
    this.grobid = deps.grobid ?? new GrobidClient()
    this.analyzer = deps.analyzer ?? new DocumentAnalyzer()
    this.storage = deps.storage ?? new StorageService()
    this.discoverFiles = deps.discoverFiles ?? discoverFiles
    this.readFile = deps.readFile ?? ((filePath) => readFile(filePath))
    this.sleep = deps.sleep ?? defaultSleep
    this.delayMs = Math.max(0, deps.delayMs ?? sanitizePositiveNumber(GROBID_REQUEST_DELAY_MS, 1_000))
    this.patterns = deps.patterns ?? PDF_PATTERNS
  }

  async run(pdfDirectory: string): Promise<BatchResult> {
    const startedAt = Date.now()
    console.info(JSON.stringify({ event: 'pipeline_started', directory: pdfDirectory }))

    const alive = await this.grobid.isAlive()
    if (!alive) {
      const summary = summarizeBatch(pdfDirectory, [], [
        `${ErrorCodes.GROBID_UNAVAILABLE}: grobid service is not reachable`
      ])
      await this.storage.putJson(SUMMARY_OBJECT_PATH, summary)
      console.warn(JSON.stringify({ event: 'pipeline_aborted', directory: pdfDirectory, reason: 'grobid_unavailable' }))
      return summary
    }

    const warnings: string[] = []
    let files: string[] = []
    try {
      const discovery = await this.discoverFiles(pdfDirectory, this.patterns)
      files = discovery.files
      if (discovery.matchedBy === 'fallback') {
        warnings.push(`no files matched ${this.patterns.primary}; using ${this.patterns.fallback}`)
      }
      if (discovery.matchedBy === 'none') {
        warnings.push(`no candidate files found in ${pdfDirectory}`)
      }
    } catch (error) {
      warnings.push(`discovery failed: ${errorMessage(error)}`)
    }

    const results: AnalysisResult[] = []
    for (const [index, filePath] of files.entries()) {
      if (index > 0 && this.delayMs > 0) {
        await this.sleep(this.delayMs)
      }
      results.push(await this.processPdf(filePath))
    }

    const summary = summarizeBatch(pdfDirectory, results, warnings)
    await this.storage.putJson(SUMMARY_OBJECT_PATH, summary)

    console.info(
      JSON.stringify({
        event: 'pipeline_completed',
        directory: pdfDirectory,
        total: summary.total,
        succeeded: summary.succeeded,
        failed: summary.failed,
        durationMs: Date.now() - startedAt
      })
    )
    return summary
  }

  private async processPdf(filePath: string): Promise<AnalysisResult> {
    const fileName = path.basename(filePath)
    const stem = fileStem(filePath)

    try {
      const pdf = await this.readPdf(filePath)
      const fulltext = await this.grobid.processFulltext(pdf, fileName)
      const tree = parseXml(fulltext.xml)
      await this.storage.putText({
        objectPath: `${stem}_fulltext.xml`,
        text: fulltext.xml,
        contentType: 'application/xml; charset=utf-8'
      })

      const headerWarning = await this.storeHeader(pdf, fileName, stem)

      const result = this.analyzer.analyze(tree, fileName)
      if (headerWarning) result.warnings.push(headerWarning)

      if (result.status === AnalysisStatus.SUCCESS) {
        await this.storage.putText({
          objectPath: `${stem}_structured.xml`,
          text: serializeXml(generateStructuredXml(result)),
          contentType: 'application/xml; charset=utf-8'
        })
      }

      console.info(
        JSON.stringify({
          event: 'pipeline_file_processed',
          file: fileName,
          status: result.status,
          sections: result.sections.length,
          references: result.references.length
        })
      )
      return result
    } catch (error) {
      const result = buildErrorResult(fileName, error)
      console.warn(
        JSON.stringify({
          event: 'pipeline_file_failed',
          file: fileName,
          code: result.error?.code,
          reason: result.error?.message
        })
      )
      return result
    }
  }

  private async readPdf(filePath: string): Promise<Uint8Array> {
    let bytes: Uint8Array
    try {
      bytes = await this.readFile(filePath)
    } catch (error) {
      throw new AppError(ErrorCodes.FILE_READ_FAILED, `file cannot be read: ${errorMessage(error)}`, 404, {
        filePath
      })
    }
    if (bytes.length === 0) {
      throw new AppError(ErrorCodes.EMPTY_FILE, 'file is empty', 400, { filePath })
    }
    return bytes
  }

  // Header TEI is optional; its failure only adds a warning to the file's result.
  private async storeHeader(pdf: Uint8Array, fileName: string, stem: string): Promise<string | null> {
    try {
      const header = await this.grobid.processHeader(pdf, fileName)
      await this.storage.putText({
        objectPath: `${stem}_header.xml`,
        text: header.xml,
        contentType: 'application/xml; charset=utf-8'
      })
      return null
    } catch (error) {
      return `header extraction degraded: ${errorMessage(error)}`
    }
  }
}
