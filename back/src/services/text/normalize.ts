export const normalizeWhitespace = (text: string): string => text.replace(/\s+/g, ' ').trim()

export const stripDiacritics = (text: string): string =>
  text.normalize('NFD').replace(/\p{M}+/gu, '')

/**
 * Lowercase, accent-free, punctuation-free form used for keyword and similarity matching.
 * Keyword tables go through the same function so both sides stay comparable.
 */
export const normalizeForMatch = (text: string): string =>
  normalizeWhitespace(stripDiacritics(text.toLowerCase()).replace(/[^\p{L}\p{N}\s]+/gu, ' '))

export const stripLeadingNumbering = (text: string): string => text.replace(/^(?:\d+\s*)+/, '')

export const normalizeHeading = (heading: string): string =>
  stripLeadingNumbering(normalizeForMatch(heading))

export const toSequentialId = (prefix: string, index: number): string => `${prefix}_${index}`

export const tokenizeWords = (text: string): string[] => text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? []
