import { readdir } from 'node:fs/promises'
import path from 'node:path'
import { AppError, ErrorCodes } from '../../utils/errors.js'

export type DiscoveryPatterns = {
  primary: string
  fallback: string
}

export type DiscoveryResult = {
  files: string[]
  matchedBy: 'primary' | 'fallback' | 'none'
}

export type DiscoverFiles = (directory: string, patterns: DiscoveryPatterns) => Promise<DiscoveryResult>

export const PDF_PATTERNS: DiscoveryPatterns = { primary: 'Tesis_*.pdf', fallback: '*.pdf' }
export const TEI_PATTERNS: DiscoveryPatterns = { primary: '*.xml', fallback: '*' }

/** `*` matches any run of characters and `?` a single one; everything else is literal. */
export const wildcardToRegExp = (pattern: string): RegExp => {
  const source = pattern
    .split('')
    .map((char) => {
      if (char === '*') return '.*'
      if (char === '?') return '.'
      return char.replace(/[.+^${}()|[\]\\]/g, '\\$&')
    })
    .join('')
  return new RegExp(`^${source}$`)
}

const listFileNames = async (directory: string): Promise<string[]> => {
  try {
    const entries = await readdir(directory, { withFileTypes: true })
    return entries.filter((entry) => entry.isFile()).map((entry) => entry.name)
  } catch (error) {
    throw new AppError(ErrorCodes.DIRECTORY_NOT_FOUND, `directory cannot be read: ${directory}`, 404, {
      directory,
      reason: error instanceof Error ? error.message : 'unknown'
    })
  }
}

/**
 * Files of `directory` (not recursive) whose names match the primary pattern, or the fallback
 * pattern when nothing matches it. Paths are sorted by file name.
 */
export const discoverFiles: DiscoverFiles = async (directory, patterns) => {
  const names = (await listFileNames(directory)).sort((left, right) => left.localeCompare(right))
  const toPaths = (matched: string[]): string[] => matched.map((name) => path.join(directory, name))

  const primary = wildcardToRegExp(patterns.primary)
  const primaryMatches = names.filter((name) => primary.test(name))
  if (primaryMatches.length > 0) {
    return { files: toPaths(primaryMatches), matchedBy: 'primary' }
  }

  const fallback = wildcardToRegExp(patterns.fallback)
  const fallbackMatches = names.filter((name) => fallback.test(name))
  if (fallbackMatches.length > 0) {
    return { files: toPaths(fallbackMatches), matchedBy: 'fallback' }
  }

  return { files: [], matchedBy: 'none' }
}
