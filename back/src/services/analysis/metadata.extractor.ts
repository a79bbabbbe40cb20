import type { DocumentMetadata, ElementNode } from '../../domain/types.js'
import { errorMessage } from '../../utils/errors.js'
import { personNames } from '../tei/persons.js'
import { findAll, findFirst, flattenText, getAttribute } from '../tei/tree.js'

export type MetadataExtraction = {
  metadata: DocumentMetadata
  warnings: string[]
}

export const emptyMetadata = (): DocumentMetadata => ({
  title: '',
  authors: [],
  date: '',
  abstract: ''
})

const TITLE_PATHS = ['//titleStmt/title', '//sourceDesc//analytic/title']
const DATE_PATHS = ['//publicationStmt/date', '//sourceDesc//date']

const extractTitle = (root: ElementNode): string => {
  for (const path of TITLE_PATHS) {
    const title = findAll(root, path)
      .map((node) => flattenText(node))
      .find((text) => text.length > 0)
    if (title) return title
  }
  return ''
}

const extractAuthors = (root: ElementNode): string[] => personNames(findAll(root, '//sourceDesc//author'))

const extractDate = (root: ElementNode): string => {
  for (const path of DATE_PATHS) {
    const date = findFirst(root, path)
    if (date) {
      return flattenText(date) || getAttribute(date, 'when').trim()
    }
  }
  return ''
}

const extractAbstract = (root: ElementNode): string =>
  findAll(root, '//abstract')
    .flatMap((abstract) => findAll(abstract, '//p'))
    .map((paragraph) => flattenText(paragraph))
    .filter((text) => text.length > 0)
    .join(' ')
    .trim()

/**
 * Title, authors, date and abstract from the TEI header. Each field is extracted on its own:
 * a failing field falls back to its empty value and leaves a warning, the others are unaffected.
 */
export const extractMetadata = (root: ElementNode): MetadataExtraction => {
  const warnings: string[] = []

  const guard = <K extends keyof DocumentMetadata>(
    field: K,
    extract: (node: ElementNode) => DocumentMetadata[K]
  ): DocumentMetadata[K] => {
    try {
      return extract(root)
    } catch (error) {
      warnings.push(`metadata.${field} degraded: ${errorMessage(error)}`)
      return emptyMetadata()[field]
    }
  }

  const metadata: DocumentMetadata = {
    title: guard('title', extractTitle),
    authors: guard('authors', extractAuthors),
    date: guard('date', extractDate),
    abstract: guard('abstract', extractAbstract)
  }

  return { metadata, warnings }
}
