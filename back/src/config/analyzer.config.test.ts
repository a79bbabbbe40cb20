import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { describe, expect, it } from 'vitest'
import {
  createAnalyzerConfig,
  findTablesPath,
  getDefaultAnalyzerConfig,
  loadAnalyzerTables,
  parseAnalyzerTables
} from './analyzer.config.js'

const minimalTables = {
  categories: [{ category: 'objetivos', keywords: ['objetivo'], labels: ['objetivos'] }],
  markers: { spanish: ['de'], english: ['the'] }
}

describe('analyzer tables', () => {
  it('loads the bundled tables in priority order', () => {
    const tables = loadAnalyzerTables()

    expect(tables.categories.map((rule) => rule.category)).toEqual([
      'resumen_abstract',
      'objetivos',
      'metodologia',
      'resultados_analisis',
      'conclusiones',
      'referencias',
      'antecedentes_estado_arte',
      'justificacion_hipotesis',
      'introduccion'
    ])
    expect(tables.markers.spanish).toContain('que')
    expect(tables.markers.english).toContain('the')
  })

  it('rejects unknown and duplicated categories', () => {
    expect(() =>
      parseAnalyzerTables({ ...minimalTables, categories: [{ category: 'otro', keywords: [], labels: [] }] })
    ).toThrow('invalid analyzer tables: categories[0].category is not a known category')

    const duplicated = [...minimalTables.categories, ...minimalTables.categories]
    expect(() => parseAnalyzerTables({ ...minimalTables, categories: duplicated })).toThrow(
      'invalid analyzer tables: category objetivos is declared twice'
    )
  })

  it('rejects blank keywords and missing markers', () => {
    expect(() =>
      parseAnalyzerTables({
        ...minimalTables,
        categories: [{ category: 'objetivos', keywords: [' '], labels: [] }]
      })
    ).toThrow('invalid analyzer tables: categories[0].keywords must contain non-empty strings only')
    expect(() => parseAnalyzerTables({ categories: minimalTables.categories })).toThrow(
      'invalid analyzer tables: markers must be an object'
    )
  })

  it('reports unreadable and invalid files', async () => {
    const directory = await mkdtemp(path.join(os.tmpdir(), 'thesis-tables-'))
    try {
      const broken = path.join(directory, 'tables.json')
      await writeFile(broken, '{')

      expect(() => loadAnalyzerTables(broken)).toThrow('invalid analyzer tables: file is not valid JSON')
      expect(() => loadAnalyzerTables(path.join(directory, 'missing.json'))).toThrow(
        'invalid analyzer tables: file could not be read'
      )
    } finally {
      await rm(directory, { recursive: true, force: true })
    }
  })

  it('finds the tables from a compiled output directory', async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), 'thesis-layout-'))
    try {
      const compiledConfigDir = path.join(root, 'dist', 'back', 'src', 'config')
      const sourceConfigDir = path.join(root, 'back', 'src', 'config')
      const tablesPath = path.join(root, 'back', 'data', 'analyzer.tables.json')
      await mkdir(compiledConfigDir, { recursive: true })
      await mkdir(sourceConfigDir, { recursive: true })
      await mkdir(path.dirname(tablesPath), { recursive: true })
      await writeFile(tablesPath, JSON.stringify(minimalTables))

      expect(findTablesPath(compiledConfigDir)).toBe(tablesPath)
      expect(findTablesPath(sourceConfigDir)).toBe(tablesPath)
      expect(loadAnalyzerTables(tablesPath).categories.map((rule) => rule.category)).toEqual(['objetivos'])
    } finally {
      await rm(root, { recursive: true, force: true })
    }
  })
})

describe('createAnalyzerConfig', () => {
  it('applies overrides and replaces out-of-range values with defaults', () => {
    const config = createAnalyzerConfig(
      { similarityThreshold: 0.9, bodySampleChars: -1, languageMargin: 3 },
      parseAnalyzerTables(minimalTables)
    )

    expect(config.similarityThreshold).toBe(0.9)
    expect(config.bodySampleChars).toBe(300)
    expect(config.languageMargin).toBe(0.05)
    expect(config.categories).toEqual([{ category: 'objetivos', keywords: ['objetivo'], labels: ['objetivos'] }])
  })

  it('returns a frozen configuration', () => {
    const config = createAnalyzerConfig({}, parseAnalyzerTables(minimalTables))

    expect(Object.isFrozen(config)).toBe(true)
    expect(Object.isFrozen(config.categories[0]?.keywords)).toBe(true)
  })

  it('shares one default configuration', () => {
    expect(getDefaultAnalyzerConfig()).toBe(getDefaultAnalyzerConfig())
  })
})
