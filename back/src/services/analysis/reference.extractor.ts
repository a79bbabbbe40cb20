import type { DocumentReference, ElementNode } from '../../domain/types.js'
import { personNames } from '../tei/persons.js'
import { findAll, findFirst, flattenText, getAttribute } from '../tei/tree.js'
import { toSequentialId } from '../text/normalize.js'

const ENTRY_TAGS = new Set(['biblStruct', 'bibl'])
const YEAR_PATTERN = /\b(\d{4})\b/

// Pre-order walk so entries of nested lists stay where they appear in the document.
const collectEntries = (node: ElementNode, parentTag = '', out: ElementNode[] = []): ElementNode[] => {
  if (parentTag === 'listBibl' && ENTRY_TAGS.has(node.tag)) {
    out.push(node)
  }
  for (const child of node.children) {
    collectEntries(child, node.tag, out)
  }
  return out
}

const extractTitle = (entry: ElementNode): string => {
  const titles = findAll(entry, '//title')
  const article = titles.find((title) => getAttribute(title, 'level') === 'a')
  const chosen = article ?? titles[0]
  return chosen ? flattenText(chosen) : ''
}

const extractYear = (entry: ElementNode): string => {
  const date = findFirst(entry, '//date')
  if (!date) return ''

  const source = getAttribute(date, 'when') || flattenText(date)
  return source.match(YEAR_PATTERN)?.[1] ?? ''
}

const extractKey = (entry: ElementNode, index: number): string =>
  getAttribute(entry, 'xml:id').trim() || toSequentialId('bib', index + 1)

export const toReference = (entry: ElementNode, index: number): DocumentReference => ({
  key: extractKey(entry, index),
  raw: flattenText(entry, { separator: ' ' }),
  title: extractTitle(entry),
  authors: personNames(findAll(entry, '//author')).join('; '),
  year: extractYear(entry)
})

/** One reference per bibliography entry (`listBibl/biblStruct` or `listBibl/bibl`), document order. */
export const extractReferences = (root: ElementNode): DocumentReference[] =>
  collectEntries(root).map((entry, index) => toReference(entry, index))
