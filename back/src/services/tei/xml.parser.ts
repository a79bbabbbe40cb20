import { XMLParser, XMLValidator } from 'fast-xml-parser'
import type { ElementNode } from '../../domain/types.js'
import { AppError, ErrorCodes } from '../../utils/errors.js'

/**
 * A node in fast-xml-parser's preserveOrder output: either `{ "#text": string }` or
 * `{ tagName: OrderedNode[], ":@"?: { "@_attr": value } }`.
 */
type OrderedNode = Record<string, unknown>

const ATTRIBUTE_PREFIX = '@_'
const TEXT_KEY = '#text'
const ATTRIBUTES_KEY = ':@'
const CONTROL_CHARACTERS = /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_KEY,
  trimValues: false,
  parseTagValue: false,
  parseAttributeValue: false,
  preserveOrder: true,
  processEntities: true,
  htmlEntities: true,
  ignoreDeclaration: true,
  ignorePiTags: true
})

const isOrderedNode = (value: unknown): value is OrderedNode =>
  Boolean(value) && typeof value === 'object' && !Array.isArray(value)

const getTagName = (node: OrderedNode): string | undefined => {
  for (const key of Object.keys(node)) {
    if (key === ATTRIBUTES_KEY || key === TEXT_KEY) continue
    if (key.startsWith('?') || key === '#comment') continue
    return key
  }
  return undefined
}

const getAttributes = (node: OrderedNode): Record<string, string> => {
  const attrs = node[ATTRIBUTES_KEY]
  if (!isOrderedNode(attrs)) return {}

  const result: Record<string, string> = {}
  for (const [key, value] of Object.entries(attrs)) {
    if (key.startsWith(ATTRIBUTE_PREFIX)) {
      result[key.slice(ATTRIBUTE_PREFIX.length)] = String(value)
    }
  }
  return result
}

const toText = (value: unknown): string =>
  typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'
    ? String(value)
    : ''

const toElement = (tag: string, node: OrderedNode): ElementNode => {
  const element: ElementNode = {
    tag,
    attributes: getAttributes(node),
    text: '',
    tail: '',
    children: []
  }

  const content = node[tag]
  if (!Array.isArray(content)) return element

  for (const item of content) {
    if (!isOrderedNode(item)) continue

    if (TEXT_KEY in item) {
      const text = toText(item[TEXT_KEY])
      const lastChild = element.children[element.children.length - 1]
      if (lastChild) {
        lastChild.tail += text
      } else {
        element.text += text
      }
      continue
    }

    const childTag = getTagName(item)
    if (childTag) {
      element.children.push(toElement(childTag, item))
    }
  }

  return element
}

const validationFailure = (xml: string): string | null => {
  const outcome = XMLValidator.validate(xml)
  if (outcome === true) return null
  return `${outcome.err.msg} (line ${outcome.err.line}, column ${outcome.err.col})`
}

export const stripControlCharacters = (xml: string): string => xml.replace(CONTROL_CHARACTERS, '')

/**
 * Parses an XML string into an element tree. Invalid input is retried once with control
 * characters removed before failing with INVALID_XML.
 */
export const parseXml = (xml: string): ElementNode => {
  const trimmed = xml.trim()
  if (!trimmed) {
    throw new AppError(ErrorCodes.INVALID_XML, 'xml content is empty', 400)
  }
  if (!trimmed.startsWith('<')) {
    throw new AppError(ErrorCodes.INVALID_XML, 'content does not look like xml', 400, {
      preview: trimmed.slice(0, 100)
    })
  }

  let source = trimmed
  const failure = validationFailure(source)
  if (failure) {
    source = stripControlCharacters(trimmed)
    const retryFailure = validationFailure(source)
    if (retryFailure) {
      throw new AppError(ErrorCodes.INVALID_XML, `malformed xml: ${failure}`, 400)
    }
  }

  const parsed: unknown = parser.parse(source)
  const nodes = Array.isArray(parsed) ? parsed : []
  for (const node of nodes) {
    if (!isOrderedNode(node)) continue
    const tag = getTagName(node)
    if (tag) {
      return toElement(tag, node)
    }
  }

  throw new AppError(ErrorCodes.INVALID_XML, 'xml has no root element', 400)
}

// GROBID output is UTF-8; hand-made files sometimes arrive as latin-1.
export const decodeXmlBuffer = (buffer: Uint8Array): string => {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(buffer)
  } catch {
    return new TextDecoder('latin1').decode(buffer)
  }
}
