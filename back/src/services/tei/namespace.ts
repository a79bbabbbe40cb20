import type { ElementNode } from '../../domain/types.js'

const BRACE_QUALIFIER = /^\{[^}]*\}/

/** `{http://www.tei-c.org/ns/1.0}div` and `tei:div` both become `div`. */
export const localName = (tag: string): string => {
  const withoutUri = tag.replace(BRACE_QUALIFIER, '')
  const colon = withoutUri.lastIndexOf(':')
  return colon >= 0 ? withoutUri.slice(colon + 1) : withoutUri
}

export const normalizeTags = (node: ElementNode): ElementNode => ({
  tag: localName(node.tag),
  attributes: { ...node.attributes },
  text: node.text,
  tail: node.tail,
  children: node.children.map((child) => normalizeTags(child))
})
