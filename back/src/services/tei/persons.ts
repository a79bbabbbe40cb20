import type { ElementNode } from '../../domain/types.js'
import { normalizeWhitespace } from '../text/normalize.js'
import { findAll, flattenText } from './tree.js'

/** Given names followed by family names, e.g. `María José Pérez`. Empty when neither exists. */
export const personName = (author: ElementNode): string => {
  const forenames = findAll(author, '//forename').map((node) => flattenText(node))
  const surnames = findAll(author, '//surname').map((node) => flattenText(node))
  return normalizeWhitespace([...forenames, ...surnames].join(' '))
}

export const personNames = (authors: ElementNode[]): string[] =>
  authors.map((author) => personName(author)).filter((name) => name.length > 0)
