import { describe, expect, it } from 'vitest'
import { personName, personNames } from './persons.js'
import { findAll } from './tree.js'
import { parseXml } from './xml.parser.js'

describe('personName', () => {
  it('puts forenames before surnames', () => {
    const author = parseXml(
      '<author><persName><surname>Pérez</surname><forename>María</forename><forename>José</forename></persName></author>'
    )
    expect(personName(author)).toBe('María José Pérez')
  })

  it('drops authors without a name', () => {
    const list = parseXml(
      '<list><author><persName><surname>Quispe</surname></persName></author><author><affiliation>UNI</affiliation></author></list>'
    )
    expect(personNames(findAll(list, '//author'))).toEqual(['Quispe'])
  })
})
