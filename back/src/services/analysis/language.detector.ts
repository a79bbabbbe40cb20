import { getDefaultAnalyzerConfig } from '../../config/analyzer.config.js'
import { Language } from '../../domain/enums.js'
import type { AnalyzerConfig, LanguageMarkers, LanguageScores } from '../../domain/types.js'
import { tokenizeWords } from '../text/normalize.js'

const SPANISH_LETTERS = /[ñáéíóúü]/

const markerSets = new WeakMap<LanguageMarkers, { spanish: Set<string>; english: Set<string> }>()

const getMarkerSets = (markers: LanguageMarkers): { spanish: Set<string>; english: Set<string> } => {
  const cached = markerSets.get(markers)
  if (cached) return cached

  const sets = {
    spanish: new Set(markers.spanish.map((word) => word.toLowerCase())),
    english: new Set(markers.english.map((word) => word.toLowerCase()))
  }
  markerSets.set(markers, sets)
  return sets
}

const decide = (spanish: number, english: number, config: AnalyzerConfig): Language => {
  if (Math.max(spanish, english) <= config.languageMinScore) return Language.UNKNOWN
  if (spanish - english > config.languageMargin) return Language.SPANISH
  if (english - spanish > config.languageMargin) return Language.ENGLISH
  return Language.UNKNOWN
}

/**
 * Marker-word scores over the first `languageSampleWords` words. A word counts for Spanish
 * when it is a Spanish marker or carries a Spanish-only letter.
 */
export const scoreLanguage = (
  text: string,
  config: AnalyzerConfig = getDefaultAnalyzerConfig()
): LanguageScores => {
  const words = tokenizeWords(text).slice(0, config.languageSampleWords)
  if (words.length === 0) {
    return { language: Language.UNKNOWN, spanish: 0, english: 0, words: 0 }
  }

  const sets = getMarkerSets(config.markers)
  let spanishCount = 0
  let englishCount = 0
  for (const word of words) {
    if (sets.spanish.has(word) || SPANISH_LETTERS.test(word)) {
      spanishCount += 1
    } else if (sets.english.has(word)) {
      englishCount += 1
    }
  }

  const spanish = spanishCount / words.length
  const english = englishCount / words.length
  return {
    language: decide(spanish, english, config),
    spanish,
    english,
    words: words.length
  }
}

export const detectLanguage = (
  text: string,
  config: AnalyzerConfig = getDefaultAnalyzerConfig()
): Language => scoreLanguage(text, config).language

/** Most frequent known language; ties and all-unknown input give `unknown`. */
export const voteLanguage = (languages: readonly Language[]): Language => {
  let spanish = 0
  let english = 0
  for (const language of languages) {
    if (language === Language.SPANISH) spanish += 1
    if (language === Language.ENGLISH) english += 1
  }

  if (spanish > english) return Language.SPANISH
  if (english > spanish) return Language.ENGLISH
  return Language.UNKNOWN
}
