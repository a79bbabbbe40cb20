import { XMLBuilder } from 'fast-xml-parser'
import type { AnalysisResult, DocumentReference, DocumentSection, ElementNode } from '../../domain/types.js'

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>'

const builder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  format: true,
  indentBy: '  ',
  suppressEmptyNode: true,
  processEntities: true
})

const element = (
  tag: string,
  options: { attributes?: Record<string, string>; text?: string; children?: ElementNode[] } = {}
): ElementNode => ({
  tag,
  attributes: options.attributes ?? {},
  text: options.text ?? '',
  tail: '',
  children: options.children ?? []
})

const textElement = (tag: string, text: string): ElementNode => element(tag, { text })

const buildMetadata = (result: AnalysisResult): ElementNode => {
  const { metadata } = result
  const children: ElementNode[] = []

  if (metadata.title) children.push(textElement('titulo', metadata.title))
  if (metadata.authors.length > 0) {
    children.push(
      element('autores', {
        children: metadata.authors.map((author) => textElement('autor', author))
      })
    )
  }
  if (metadata.date) children.push(textElement('fecha', metadata.date))
  if (metadata.abstract) children.push(textElement('resumen', metadata.abstract))
  children.push(textElement('idioma', result.language))

  return element('metadatos', { children })
}

const buildSection = (section: DocumentSection): ElementNode =>
  element('seccion', {
    attributes: {
      categoria: section.category,
      indice: String(section.index),
      idioma: section.language
    },
    children: [textElement('titulo', section.heading), textElement('texto', section.body)]
  })

// One element per category present, named after it, listing its sections by index and title.
const buildCategories = (result: AnalysisResult): ElementNode =>
  element('categorias', {
    children: result.sectionsByCategory.map((group) =>
      element(group.category, {
        children: group.sections.map((index) =>
          element('seccion', {
            attributes: { indice: String(index) },
            children: [textElement('titulo', result.sections[index]?.heading ?? '')]
          })
        )
      })
    )
  })

const buildReference = (reference: DocumentReference): ElementNode => {
  const children = [textElement('texto', reference.raw)]
  if (reference.title) children.push(textElement('titulo', reference.title))
  if (reference.authors) children.push(textElement('autores', reference.authors))
  if (reference.year) children.push(textElement('anio', reference.year))

  return element('referencia', { attributes: { clave: reference.key }, children })
}

/**
 * Categorized XML view of an analysis: metadata, one `seccion` per section carrying its
 * category, the sections grouped per category, one `referencia` per bibliography entry, and
 * the error when analysis failed.
 */
export const generateStructuredXml = (result: AnalysisResult): ElementNode => {
  const children = [
    buildMetadata(result),
    element('contenido', { children: result.sections.map((section) => buildSection(section)) })
  ]

  if (result.sectionsByCategory.length > 0) {
    children.push(buildCategories(result))
  }

  if (result.references.length > 0) {
    children.push(
      element('referencias', {
        children: result.references.map((reference) => buildReference(reference))
      })
    )
  }

  if (result.error) {
    children.push(element('error', { attributes: { codigo: result.error.code }, text: result.error.message }))
  }

  return element('tesis', {
    attributes: {
      archivo: result.file,
      idioma: result.language,
      estado: result.status
    },
    children
  })
}

type OrderedNode = Record<string, unknown>

const toOrderedNode = (node: ElementNode): OrderedNode => {
  const content: OrderedNode[] = []
  if (node.text) content.push({ '#text': node.text })
  for (const child of node.children) {
    content.push(toOrderedNode(child))
    if (child.tail) content.push({ '#text': child.tail })
  }

  const attributes = Object.entries(node.attributes)
  if (attributes.length === 0) {
    return { [node.tag]: content }
  }

  return {
    [node.tag]: content,
    ':@': Object.fromEntries(attributes.map(([name, value]) => [`@_${name}`, value]))
  }
}

export const serializeXml = (node: ElementNode): string => {
  const body: unknown = builder.build([toOrderedNode(node)])
  return `${XML_DECLARATION}\n${String(body).trim()}\n`
}
