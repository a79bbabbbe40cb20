import { existsSync, readFileSync } from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { SECTION_CATEGORIES, SectionCategory } from '../domain/enums.js'
import type { AnalyzerConfig, CategoryRule, LanguageMarkers } from '../domain/types.js'
import { AppError, ErrorCodes } from '../utils/errors.js'
import { sanitizePositiveNumber, sanitizeRatio } from './env.js'

const TABLES_FILE = 'analyzer.tables.json'
const TABLES_CANDIDATES = [path.join('data', TABLES_FILE), path.join('back', 'data', TABLES_FILE)]
const SIMILARITY_THRESHOLD = Number(process.env.SIMILARITY_THRESHOLD ?? 0.75)
const BODY_SAMPLE_CHARS = Number(process.env.BODY_SAMPLE_CHARS ?? 300)
const LANGUAGE_SAMPLE_WORDS = Number(process.env.LANGUAGE_SAMPLE_WORDS ?? 100)
const LANGUAGE_MIN_SCORE = Number(process.env.LANGUAGE_MIN_SCORE ?? 0.05)
const LANGUAGE_MARGIN = Number(process.env.LANGUAGE_MARGIN ?? 0.05)
const ANALYZER_CONCURRENCY = Number(process.env.ANALYZER_CONCURRENCY ?? 4)

export type AnalyzerTables = {
  categories: CategoryRule[]
  markers: LanguageMarkers
}

const invalidTables = (message: string, details?: Record<string, unknown>): AppError =>
  new AppError(ErrorCodes.INVALID_CONFIG, `invalid analyzer tables: ${message}`, 500, details)

const toStringList = (value: unknown, field: string): string[] => {
  if (!Array.isArray(value)) {
    throw invalidTables(`${field} must be an array`)
  }

  const list = value.filter((item): item is string => typeof item === 'string' && item.trim().length > 0)
  if (list.length !== value.length) {
    throw invalidTables(`${field} must contain non-empty strings only`)
  }
  return list
}

const isRuleCategory = (value: unknown): value is CategoryRule['category'] =>
  typeof value === 'string' &&
  value !== SectionCategory.OTRO &&
  SECTION_CATEGORIES.some((category) => category === value)

const parseCategoryRule = (value: unknown, index: number): CategoryRule => {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    throw invalidTables(`categories[${index}] must be an object`)
  }

  const record = value as Record<string, unknown>
  if (!isRuleCategory(record.category)) {
    throw invalidTables(`categories[${index}].category is not a known category`, {
      category: record.category
    })
  }

  return {
    category: record.category,
    keywords: toStringList(record.keywords, `categories[${index}].keywords`),
    labels: toStringList(record.labels, `categories[${index}].labels`)
  }
}

export const parseAnalyzerTables = (value: unknown): AnalyzerTables => {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    throw invalidTables('root must be an object')
  }

  const record = value as Record<string, unknown>
  if (!Array.isArray(record.categories) || record.categories.length === 0) {
    throw invalidTables('categories must be a non-empty array')
  }
  const categories = record.categories.map((item, index) => parseCategoryRule(item, index))
  const seen = new Set<string>()
  for (const rule of categories) {
    if (seen.has(rule.category)) {
      throw invalidTables(`category ${rule.category} is declared twice`)
    }
    seen.add(rule.category)
  }

  const markers = record.markers
  if (!markers || typeof markers !== 'object' || Array.isArray(markers)) {
    throw invalidTables('markers must be an object')
  }
  const markerRecord = markers as Record<string, unknown>

  return {
    categories,
    markers: {
      spanish: toStringList(markerRecord.spanish, 'markers.spanish'),
      english: toStringList(markerRecord.english, 'markers.english')
    }
  }
}

/**
 * Walks up from `startDir` until a `data/` or `back/data/` directory holds the tables, so the
 * lookup works from both `back/src/config` and the compiled `dist/back/src/config`.
 */
export const findTablesPath = (startDir: string): string | null => {
  let dir = path.resolve(startDir)
  for (;;) {
    for (const candidate of TABLES_CANDIDATES) {
      const fullPath = path.join(dir, candidate)
      if (existsSync(fullPath)) return fullPath
    }
    const parent = path.dirname(dir)
    if (parent === dir) return null
    dir = parent
  }
}

const resolveDefaultTablesPath = (): string => {
  const configured = process.env.ANALYZER_TABLES_PATH
  if (configured) return configured

  const moduleDir = path.dirname(fileURLToPath(import.meta.url))
  const found = findTablesPath(moduleDir)
  if (!found) {
    throw invalidTables('file could not be located', { searchedFrom: moduleDir })
  }
  return found
}

export const loadAnalyzerTables = (tablesPath: string = resolveDefaultTablesPath()): AnalyzerTables => {
  let raw: string
  try {
    raw = readFileSync(tablesPath, 'utf8')
  } catch (error) {
    throw invalidTables('file could not be read', {
      tablesPath,
      reason: error instanceof Error ? error.message : 'unknown'
    })
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw) as unknown
  } catch (error) {
    throw invalidTables('file is not valid JSON', {
      tablesPath,
      reason: error instanceof Error ? error.message : 'unknown'
    })
  }

  return parseAnalyzerTables(parsed)
}

const freezeConfig = (config: AnalyzerConfig): AnalyzerConfig => {
  for (const rule of config.categories) {
    Object.freeze(rule.keywords)
    Object.freeze(rule.labels)
    Object.freeze(rule)
  }
  Object.freeze(config.categories)
  Object.freeze(config.markers.spanish)
  Object.freeze(config.markers.english)
  Object.freeze(config.markers)
  return Object.freeze(config)
}

export type AnalyzerConfigOverrides = Partial<AnalyzerConfig>

export const createAnalyzerConfig = (
  overrides: AnalyzerConfigOverrides = {},
  tables: AnalyzerTables = loadAnalyzerTables()
): AnalyzerConfig =>
  freezeConfig({
    categories: (overrides.categories ?? tables.categories).map((rule) => ({
      category: rule.category,
      keywords: [...rule.keywords],
      labels: [...rule.labels]
    })),
    markers: {
      spanish: [...(overrides.markers ?? tables.markers).spanish],
      english: [...(overrides.markers ?? tables.markers).english]
    },
    similarityThreshold: sanitizeRatio(overrides.similarityThreshold ?? SIMILARITY_THRESHOLD, 0.75),
    bodySampleChars: sanitizePositiveNumber(overrides.bodySampleChars ?? BODY_SAMPLE_CHARS, 300),
    languageSampleWords: sanitizePositiveNumber(
      overrides.languageSampleWords ?? LANGUAGE_SAMPLE_WORDS,
      100
    ),
    languageMinScore: sanitizeRatio(overrides.languageMinScore ?? LANGUAGE_MIN_SCORE, 0.05),
    languageMargin: sanitizeRatio(overrides.languageMargin ?? LANGUAGE_MARGIN, 0.05),
    concurrency: sanitizePositiveNumber(overrides.concurrency ?? ANALYZER_CONCURRENCY, 4)
  })

let defaultConfig: AnalyzerConfig | null = null

// Loaded on first use and shared read-only afterwards.
export const getDefaultAnalyzerConfig = (): AnalyzerConfig => {
  if (!defaultConfig) {
    defaultConfig = createAnalyzerConfig()
  }
  return defaultConfig
}
