import { readFile } from 'node:fs/promises'
import path from 'node:path'
import { getDefaultAnalyzerConfig } from '../../config/analyzer.config.js'
import { AnalysisStatus, Language } from '../../domain/enums.js'
import type {
  AnalysisResult,
  AnalyzerConfig,
  BatchResult,
  DocumentReference,
  DocumentSection,
  ElementNode
} from '../../domain/types.js'
import { AppError, ErrorCodes, errorMessage, toAnalysisError } from '../../utils/errors.js'
import { parallelMap } from '../../utils/parallel.js'
import { discoverFiles, TEI_PATTERNS } from '../files/discovery.js'
import type { DiscoverFiles, DiscoveryPatterns } from '../files/discovery.js'
import { normalizeTags } from '../tei/namespace.js'
import { childrenByTag, findAll, flattenText } from '../tei/tree.js'
import { decodeXmlBuffer, parseXml } from '../tei/xml.parser.js'
import { detectLanguage, voteLanguage } from './language.detector.js'
import { emptyMetadata, extractMetadata } from './metadata.extractor.js'
import type { MetadataExtraction } from './metadata.extractor.js'
import { extractReferences } from './reference.extractor.js'
import { categorizeSection, groupSectionsByCategory } from './section.categorizer.js'

// Per-document extraction steps; each runs isolated so one failure only empties its own field.
export type AnalysisSteps = {
  extractMetadata: (root: ElementNode) => MetadataExtraction
  extractReferences: (root: ElementNode) => DocumentReference[]
  sectionHeading: (div: ElementNode) => string
  sectionBody: (div: ElementNode) => string
  fullText: (root: ElementNode) => string
}

type DocumentAnalyzerDependencies = {
  config?: AnalyzerConfig
  discoverFiles?: DiscoverFiles
  readFile?: (filePath: string) => Promise<Uint8Array>
  steps?: Partial<AnalysisSteps>
}

export type AnalyzeDirectoryOptions = {
  patterns?: DiscoveryPatterns
  concurrency?: number
}

const withFallback = <T>(label: string, warnings: string[], fallback: T, run: () => T): T => {
  try {
    return run()
  } catch (error) {
    warnings.push(`${label} degraded: ${errorMessage(error)}`)
    return fallback
  }
}

// Paragraphs that belong to this division, leaving nested divisions to their own section.
const collectParagraphs = (node: ElementNode, output: ElementNode[]): ElementNode[] => {
  for (const child of node.children) {
    if (child.tag === 'div') continue
    if (child.tag === 'p') {
      output.push(child)
      continue
    }
    collectParagraphs(child, output)
  }
  return output
}

const sectionHeading = (div: ElementNode): string => {
  const head = childrenByTag(div, 'head')[0]
  return head ? flattenText(head) : ''
}

const joinParagraphs = (paragraphs: ElementNode[]): string =>
  paragraphs
    .map((paragraph) => flattenText(paragraph))
    .filter((text) => text.length > 0)
    .join(' ')

const sectionBody = (div: ElementNode): string => joinParagraphs(collectParagraphs(div, []))

const fullText = (root: ElementNode): string => joinParagraphs(findAll(root, '//body//p'))

const DEFAULT_STEPS: AnalysisSteps = {
  extractMetadata,
  extractReferences,
  sectionHeading,
  sectionBody,
  fullText
}

export const buildErrorResult = (file: string, error: unknown): AnalysisResult => ({
  schemaVersion: 'v1',
  file,
  status: AnalysisStatus.ERROR,
  metadata: emptyMetadata(),
  sections: [],
  sectionsByCategory: [],
  references: [],
  fullText: '',
  language: Language.UNKNOWN,
  warnings: [],
  error: toAnalysisError(error)
})

export const summarizeBatch = (
  directory: string,
  results: AnalysisResult[],
  warnings: string[] = []
): BatchResult => {
  const succeeded = results.filter((result) => result.status === AnalysisStatus.SUCCESS).length
  return {
    schemaVersion: 'v1',
    directory,
    total: results.length,
    succeeded,
    failed: results.length - succeeded,
    results,
    warnings
  }
}

export class DocumentAnalyzer {
  private readonly config: AnalyzerConfig
  private readonly discoverFiles: DiscoverFiles
  private readonly readFile: (filePath: string) => Promise<Uint8Array>
  private readonly steps: AnalysisSteps

  constructor(dependencies: DocumentAnalyzerDependencies = {}) {
    this.config = dependencies.config ?? getDefaultAnalyzerConfig()
    this.discoverFiles = dependencies.discoverFiles ?? discoverFiles
    this.readFile = dependencies.readFile ?? ((filePath) => readFile(filePath))
    this.steps = { ...DEFAULT_STEPS, ...dependencies.steps }
  }

  /**
   * Analyzes one TEI document. Only input that cannot be parsed at all yields an error result;
   * problems in individual fields or sections degrade those parts and are listed in `warnings`.
   */
  analyze(input: ElementNode | string, file = ''): AnalysisResult {
    try {
      const tree = typeof input === 'string' ? parseXml(input) : input
      return this.analyzeTree(tree, file)
    } catch (error) {
      const result = buildErrorResult(file, error)
      console.warn(
        JSON.stringify({
          event: 'document_analysis_failed',
          file,
          code: result.error?.code,
          reason: result.error?.message
        })
      )
      return result
    }
  }

  async analyzeFile(filePath: string): Promise<AnalysisResult> {
    const file = path.basename(filePath)

    let bytes: Uint8Array
    try {
      bytes = await this.readFile(filePath)
    } catch (error) {
      return buildErrorResult(
        file,
        new AppError(ErrorCodes.FILE_READ_FAILED, `file cannot be read: ${errorMessage(error)}`, 404, {
          filePath
        })
      )
    }

    if (bytes.length === 0) {
      return buildErrorResult(file, new AppError(ErrorCodes.EMPTY_FILE, 'file is empty', 400, { filePath }))
    }

    return this.analyze(decodeXmlBuffer(bytes), file)
  }

  /**
   * Analyzes every candidate file of a directory. Each discovered file yields exactly one
   * result, in discovery order; failures stay attached to their own result.
   */
  async analyzeDirectory(directory: string, options: AnalyzeDirectoryOptions = {}): Promise<BatchResult> {
    const patterns = options.patterns ?? TEI_PATTERNS
    const warnings: string[] = []

    let files: string[]
    try {
      const discovery = await this.discoverFiles(directory, patterns)
      files = discovery.files
      if (discovery.matchedBy === 'fallback') {
        warnings.push(`no files matched ${patterns.primary}; using ${patterns.fallback}`)
      }
      if (discovery.matchedBy === 'none') {
        warnings.push(`no candidate files found in ${directory}`)
      }
    } catch (error) {
      console.warn(
        JSON.stringify({
          event: 'batch_discovery_failed',
          directory,
          reason: errorMessage(error)
        })
      )
      return summarizeBatch(directory, [], [`discovery failed: ${errorMessage(error)}`])
    }

    const results = await parallelMap(
      files,
      async (filePath) => {
        try {
          return await this.analyzeFile(filePath)
        } catch (error) {
          return buildErrorResult(path.basename(filePath), error)
        }
      },
      options.concurrency ?? this.config.concurrency
    )

    const batch = summarizeBatch(directory, results, warnings)
    console.info(
      JSON.stringify({
        event: 'batch_analysis_completed',
        directory,
        total: batch.total,
        succeeded: batch.succeeded,
        failed: batch.failed
      })
    )
    return batch
  }

  private analyzeTree(tree: ElementNode, file: string): AnalysisResult {
    const root = normalizeTags(tree)
    const warnings: string[] = []
    const extraction = withFallback<MetadataExtraction>(
      'metadata',
      warnings,
      { metadata: emptyMetadata(), warnings: [] },
      () => this.steps.extractMetadata(root)
    )
    warnings.push(...extraction.warnings)
    const { metadata } = extraction
    const sections = this.extractSections(root, warnings)
    const references = withFallback<DocumentReference[]>('references', warnings, [], () =>
      this.steps.extractReferences(root)
    )
    const text = withFallback('fullText', warnings, '', () => this.steps.fullText(root))

    return {
      schemaVersion: 'v1',
      file,
      status: AnalysisStatus.SUCCESS,
      metadata,
      sections,
      sectionsByCategory: groupSectionsByCategory(sections),
      references,
      fullText: text,
      language: voteLanguage(sections.map((section) => section.language)),
      warnings,
      error: null
    }
  }

  private extractSections(root: ElementNode, warnings: string[]): DocumentSection[] {
    return findAll(root, '//body//div').map((div, index) => {
      const { sectionHeading: readHeading, sectionBody: readBody } = this.steps
      const heading = withFallback(`sections[${index}].heading`, warnings, '', () => readHeading(div))
      const body = withFallback(`sections[${index}].body`, warnings, '', () => readBody(div))

      return {
        index,
        heading,
        body,
        category: categorizeSection(heading, body, this.config),
        language: detectLanguage(body || heading, this.config)
      }
    })
  }
}
