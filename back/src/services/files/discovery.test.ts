import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { AppError } from '../../utils/errors.js'
import { discoverFiles, PDF_PATTERNS, TEI_PATTERNS, wildcardToRegExp } from './discovery.js'

describe('wildcardToRegExp', () => {
  it('treats only * and ? as wildcards', () => {
    const pattern = wildcardToRegExp('Tesis_*.pdf')
    expect(pattern.test('Tesis_2021.pdf')).toBe(true)
    expect(pattern.test('Tesis_2021xpdf')).toBe(false)
    expect(wildcardToRegExp('a?.xml').test('ab.xml')).toBe(true)
    expect(wildcardToRegExp('a?.xml').test('abc.xml')).toBe(false)
  })
})

describe('discoverFiles', () => {
  let directory = ''

  beforeEach(async () => {
    directory = await mkdtemp(path.join(os.tmpdir(), 'thesis-discovery-'))
  })

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true })
  })

  it('prefers files matching the primary pattern, sorted by name', async () => {
    for (const name of ['Tesis_b.pdf', 'otro.pdf', 'Tesis_a.pdf']) {
      await writeFile(path.join(directory, name), 'x')
    }

    expect(await discoverFiles(directory, PDF_PATTERNS)).toEqual({
      files: [path.join(directory, 'Tesis_a.pdf'), path.join(directory, 'Tesis_b.pdf')],
      matchedBy: 'primary'
    })
  })

  it('uses the fallback pattern when the primary one finds nothing', async () => {
    await writeFile(path.join(directory, 'otro.pdf'), 'x')
    await writeFile(path.join(directory, 'notas.txt'), 'x')

    expect(await discoverFiles(directory, PDF_PATTERNS)).toEqual({
      files: [path.join(directory, 'otro.pdf')],
      matchedBy: 'fallback'
    })
  })

  it('ignores subdirectories', async () => {
    await mkdir(path.join(directory, 'nested.xml'))

    expect(await discoverFiles(directory, TEI_PATTERNS)).toEqual({ files: [], matchedBy: 'none' })
  })

  it('fails for a missing directory', async () => {
    const missing = path.join(directory, 'missing')
    await expect(discoverFiles(missing, TEI_PATTERNS)).rejects.toBeInstanceOf(AppError)
    await expect(discoverFiles(missing, TEI_PATTERNS)).rejects.toMatchObject({ code: 'DIRECTORY_NOT_FOUND' })
  })
})
