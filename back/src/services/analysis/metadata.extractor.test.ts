import { describe, expect, it } from 'vitest'
import { SAMPLE_TEI } from '../../test/teiSamples.js'
import { normalizeTags } from '../tei/namespace.js'
import { findFirst } from '../tei/tree.js'
import { parseXml } from '../tei/xml.parser.js'
import { emptyMetadata, extractMetadata } from './metadata.extractor.js'

const load = (xml: string) => normalizeTags(parseXml(xml))

describe('extractMetadata', () => {
  it('reads title, authors, date and abstract from the header', () => {
    expect(extractMetadata(load(SAMPLE_TEI))).toEqual({
      metadata: {
        title: 'Evaluación del riego por goteo en cultivos andinos',
        authors: ['María José Pérez', 'Luis Quispe'],
        date: '15 de junio de 2021',
        abstract: 'Este trabajo evalúa el riego. Se midió la eficiencia.'
      },
      warnings: []
    })
  })

  it('falls back to the analytic title and the when attribute', () => {
    const tei = load(
      '<TEI><teiHeader><fileDesc><titleStmt><title/></titleStmt>' +
        '<publicationStmt><date when="2019"/></publicationStmt>' +
        '<sourceDesc><biblStruct><analytic><title>Título alterno</title></analytic></biblStruct></sourceDesc>' +
        '</fileDesc></teiHeader></TEI>'
    )

    const { metadata } = extractMetadata(tei)
    expect(metadata.title).toBe('Título alterno')
    expect(metadata.date).toBe('2019')
  })

  it('empties a failing field and keeps the others', () => {
    const root = load(SAMPLE_TEI)
    const title = findFirst(root, '//titleStmt/title')
    expect(title).toBeDefined()
    if (title) {
      Object.defineProperty(title, 'text', {
        get() {
          throw new Error('broken title')
        }
      })
    }

    expect(extractMetadata(root)).toEqual({
      metadata: {
        title: '',
        authors: ['María José Pérez', 'Luis Quispe'],
        date: '15 de junio de 2021',
        abstract: 'Este trabajo evalúa el riego. Se midió la eficiencia.'
      },
      warnings: ['metadata.title degraded: broken title']
    })
  })

  it('leaves absent fields empty', () => {
    expect(extractMetadata(load('<TEI><text><body/></text></TEI>'))).toEqual({
      metadata: emptyMetadata(),
      warnings: []
    })
  })
})
