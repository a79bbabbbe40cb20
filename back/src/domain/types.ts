import type { CategoryMatchBasis, Language, SectionCategory } from './enums.js'

export type {
  AnalysisError,
  AnalysisResult,
  BatchResult,
  CategoryGroup,
  DocumentMetadata,
  DocumentReference,
  DocumentSection
} from '@thesis-structure/shared'

/**
 * One element of a parsed XML document.
 *
 * `text` is the character data before the first child and `tail` the character data that
 * follows the element's end tag inside its parent, so mixed content can be flattened in
 * document order.
 */
export type ElementNode = {
  tag: string
  attributes: Record<string, string>
  text: string
  tail: string
  children: ElementNode[]
}

export type CategoryRule = {
  category: Exclude<SectionCategory, 'otro'>
  keywords: readonly string[]
  labels: readonly string[]
}

export type LanguageMarkers = {
  spanish: readonly string[]
  english: readonly string[]
}

export type AnalyzerConfig = {
  // Priority order: the first rule whose keyword matches wins.
  categories: readonly CategoryRule[]
  markers: LanguageMarkers
  similarityThreshold: number
  bodySampleChars: number
  languageSampleWords: number
  languageMinScore: number
  languageMargin: number
  concurrency: number
}

export type CategoryMatch = {
  category: SectionCategory
  basis: CategoryMatchBasis
  score: number
  matched: string
}

export type LanguageScores = {
  language: Language
  spanish: number
  english: number
  words: number
}
