import { getDefaultAnalyzerConfig } from '../../config/analyzer.config.js'
import { CategoryMatchBasis, SECTION_CATEGORIES, SectionCategory } from '../../domain/enums.js'
import type { AnalyzerConfig, CategoryGroup, CategoryMatch, CategoryRule, DocumentSection } from '../../domain/types.js'
import { normalizeForMatch, normalizeHeading } from '../text/normalize.js'
import { similarityRatio } from './similarity.js'

type NormalizedRule = {
  category: CategoryRule['category']
  keywords: string[]
  labels: string[]
}

// Body matches are a weaker signal than any accepted heading match.
const BODY_KEYWORD_SCORE = 0.7

const normalizedRules = new WeakMap<AnalyzerConfig, NormalizedRule[]>()

const getNormalizedRules = (config: AnalyzerConfig): NormalizedRule[] => {
  const cached = normalizedRules.get(config)
  if (cached) return cached

  const rules = config.categories.map((rule) => ({
    category: rule.category,
    keywords: rule.keywords.map((keyword) => normalizeForMatch(keyword)).filter(Boolean),
    labels: rule.labels.map((label) => normalizeForMatch(label)).filter(Boolean)
  }))
  normalizedRules.set(config, rules)
  return rules
}

// Anchored at a word start so that "objetivo" matches "objetivos" but "aims" skips "claims".
const containsKeyword = (text: string, keyword: string): boolean =>
  ` ${text}`.includes(` ${keyword}`)

const matchKeywords = (
  text: string,
  rules: NormalizedRule[]
): { category: NormalizedRule['category']; keyword: string } | null => {
  if (!text) return null

  for (const rule of rules) {
    const keyword = rule.keywords.find((candidate) => containsKeyword(text, candidate))
    if (keyword) {
      return { category: rule.category, keyword }
    }
  }
  return null
}

const bestLabelMatch = (
  heading: string,
  rules: NormalizedRule[]
): { category: NormalizedRule['category']; label: string; score: number } | null => {
  let best: { category: NormalizedRule['category']; label: string; score: number } | null = null

  for (const rule of rules) {
    for (const label of rule.labels) {
      const score = similarityRatio(heading, label)
      if (!best || score > best.score) {
        best = { category: rule.category, label, score }
      }
    }
  }
  return best
}

/**
 * Assigns an academic category to a section and reports which signal decided it:
 * heading keywords, heading similarity to canonical labels, body keywords, or nothing.
 */
export const classifySection = (
  heading: string,
  body: string,
  config: AnalyzerConfig = getDefaultAnalyzerConfig()
): CategoryMatch => {
  const rules = getNormalizedRules(config)
  const normalizedHeading = normalizeHeading(heading)

  const headingKeyword = matchKeywords(normalizedHeading, rules)
  if (headingKeyword) {
    return {
      category: headingKeyword.category,
      basis: CategoryMatchBasis.HEADING_KEYWORD,
      score: 1,
      matched: headingKeyword.keyword
    }
  }

  if (normalizedHeading) {
    const label = bestLabelMatch(normalizedHeading, rules)
    if (label && label.score >= config.similarityThreshold) {
      return {
        category: label.category,
        basis: CategoryMatchBasis.HEADING_SIMILARITY,
        score: label.score,
        matched: label.label
      }
    }
  }

  const bodySample = normalizeForMatch(body.slice(0, config.bodySampleChars))
  const bodyKeyword = matchKeywords(bodySample, rules)
  if (bodyKeyword) {
    return {
      category: bodyKeyword.category,
      basis: CategoryMatchBasis.BODY_KEYWORD,
      score: BODY_KEYWORD_SCORE,
      matched: bodyKeyword.keyword
    }
  }

  return {
    category: SectionCategory.OTRO,
    basis: CategoryMatchBasis.NONE,
    score: 0,
    matched: ''
  }
}

export const categorizeSection = (
  heading: string,
  body: string,
  config: AnalyzerConfig = getDefaultAnalyzerConfig()
): SectionCategory => classifySection(heading, body, config).category

/** Section indices per category, categories in reading order (resumen first, otro last); empty ones omitted. */
export const groupSectionsByCategory = (
  sections: readonly Pick<DocumentSection, 'index' | 'category'>[]
): CategoryGroup[] =>
  SECTION_CATEGORIES.flatMap((category) => {
    const indices = sections.filter((section) => section.category === category).map((section) => section.index)
    return indices.length > 0 ? [{ category, sections: indices }] : []
  })
