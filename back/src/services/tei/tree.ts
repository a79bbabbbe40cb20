import type { ElementNode } from '../../domain/types.js'
import { normalizeWhitespace } from '../text/normalize.js'

type Step = {
  axis: 'child' | 'descendant'
  tag: string
}

const pathCache = new Map<string, Step[]>()

// Supports the subset used by the TEI extractors: `//a/b`, `a//b`, `/a`.
const compilePath = (path: string): Step[] => {
  const cached = pathCache.get(path)
  if (cached) return cached

  const steps: Step[] = []
  const pattern = /(\/\/|\/)?([^/]+)/g
  for (const match of path.matchAll(pattern)) {
    const tag = match[2]
    if (!tag) continue
    steps.push({ axis: match[1] === '//' ? 'descendant' : 'child', tag })
  }

  pathCache.set(path, steps)
  return steps
}

const collectDescendants = (node: ElementNode, tag: string, output: ElementNode[]): void => {
  for (const child of node.children) {
    if (tag === '*' || child.tag === tag) {
      output.push(child)
    }
    collectDescendants(child, tag, output)
  }
}

const applyStep = (nodes: ElementNode[], step: Step): ElementNode[] => {
  const seen = new Set<ElementNode>()
  const output: ElementNode[] = []

  for (const node of nodes) {
    const candidates: ElementNode[] = []
    if (step.axis === 'descendant') {
      collectDescendants(node, step.tag, candidates)
    } else {
      candidates.push(...node.children.filter((child) => step.tag === '*' || child.tag === step.tag))
    }

    for (const candidate of candidates) {
      if (seen.has(candidate)) continue
      seen.add(candidate)
      output.push(candidate)
    }
  }

  return output
}

/** All elements reached from `node` by `path`, in document order for single-branch paths. */
export const findAll = (node: ElementNode, path: string): ElementNode[] =>
  compilePath(path).reduce<ElementNode[]>((nodes, step) => applyStep(nodes, step), [node])

export const findFirst = (node: ElementNode, path: string): ElementNode | undefined =>
  findAll(node, path)[0]

export const childrenByTag = (node: ElementNode, tag: string): ElementNode[] =>
  node.children.filter((child) => child.tag === tag)

export const getAttribute = (node: ElementNode, name: string): string =>
  node.attributes[name] ?? ''

export type FlattenOptions = {
  // Inserted around every child element; structural markup such as biblStruct needs ' '.
  separator?: string
  skip?: (child: ElementNode) => boolean
}

const appendText = (node: ElementNode, parts: string[], options: FlattenOptions): void => {
  const separator = options.separator ?? ''
  parts.push(node.text)
  for (const child of node.children) {
    if (!options.skip?.(child)) {
      parts.push(separator)
      appendText(child, parts, options)
      parts.push(separator)
    }
    parts.push(child.tail)
  }
}

/**
 * Concatenated character data of `node` and its descendants, whitespace-normalized.
 * Children rejected by `skip` are left out but their tails are kept.
 */
export const flattenText = (node: ElementNode, options: FlattenOptions = {}): string => {
  const parts: string[] = []
  appendText(node, parts, options)
  return normalizeWhitespace(parts.join(''))
}
