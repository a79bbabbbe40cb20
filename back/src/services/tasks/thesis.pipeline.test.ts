import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { MINIMAL_TEI } from '../../test/teiSamples.js'
import { AppError, ErrorCodes } from '../../utils/errors.js'
import { DocumentAnalyzer } from '../analysis/document.analyzer.js'
import type { PutTextInput } from '../storage.service.js'
import { ThesisPipeline } from './thesis.pipeline.js'

const createStorage = () => ({
  putText: vi.fn(async (input: PutTextInput) => input.objectPath),
  putJson: vi.fn(async (objectPath: string, _value: unknown) => objectPath)
})

const createGrobid = (alive = true) => ({
  isAlive: vi.fn(async () => alive),
  processFulltext: vi.fn(async (_pdf: Uint8Array, fileName: string) => {
    if (fileName === 'Tesis_b.pdf') {
      throw new AppError(ErrorCodes.GROBID_FAILED, 'grobid failed: 500', 502)
    }
    return { fileName, xml: MINIMAL_TEI }
  }),
  processHeader: vi.fn(async (_pdf: Uint8Array, fileName: string) => ({ fileName, xml: '<TEI/>' }))
})

const createDiscovery = () =>
  vi.fn(async () => ({
    files: ['/pdfs/Tesis_a.pdf', '/pdfs/Tesis_b.pdf'],
    matchedBy: 'primary' as const
  }))

describe('ThesisPipeline', () => {
  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined)
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('processes every pdf and records failures without stopping', async () => {
    const storage = createStorage()
    const grobid = createGrobid()
    const sleep = vi.fn(async (_ms: number) => undefined)
    const discoverFiles = createDiscovery()
    const pipeline = new ThesisPipeline({
      grobid,
      storage,
      analyzer: new DocumentAnalyzer(),
      discoverFiles,
      readFile: async () => Uint8Array.from([1, 2, 3]),
      sleep,
      delayMs: 5
    })

    const summary = await pipeline.run('/pdfs')

    expect(summary.total).toBe(2)
    expect(summary.succeeded).toBe(1)
    expect(summary.failed).toBe(1)
    expect(summary.results[0]?.file).toBe('Tesis_a.pdf')
    expect(summary.results[0]?.sections[0]?.category).toBe('conclusiones')
    expect(summary.results[1]?.error).toEqual({ code: 'GROBID_FAILED', message: 'grobid failed: 500' })

    expect(storage.putText.mock.calls.map(([input]) => input.objectPath)).toEqual([
      'Tesis_a_fulltext.xml',
      'Tesis_a_header.xml',
      'Tesis_a_structured.xml'
    ])
    expect(storage.putJson).toHaveBeenCalledTimes(1)
    expect(storage.putJson).toHaveBeenCalledWith('thesis_analysis.json', summary)
    expect(sleep).toHaveBeenCalledTimes(1)
    expect(sleep).toHaveBeenCalledWith(5)
  })

  it('stops early when grobid is not reachable', async () => {
    const storage = createStorage()
    const grobid = createGrobid(false)
    const discoverFiles = createDiscovery()
    const pipeline = new ThesisPipeline({ grobid, storage, discoverFiles, delayMs: 0 })

    const summary = await pipeline.run('/pdfs')

    expect(summary.total).toBe(0)
    expect(summary.warnings).toEqual(['GROBID_UNAVAILABLE: grobid service is not reachable'])
    expect(discoverFiles).not.toHaveBeenCalled()
    expect(grobid.processFulltext).not.toHaveBeenCalled()
    expect(storage.putJson).toHaveBeenCalledWith('thesis_analysis.json', summary)
  })

  it('keeps the analysis when the header request fails', async () => {
    const storage = createStorage()
    const grobid = createGrobid()
    grobid.processHeader.mockRejectedValue(new Error('header timeout'))
    const pipeline = new ThesisPipeline({
      grobid,
      storage,
      analyzer: new DocumentAnalyzer(),
      discoverFiles: async () => ({ files: ['/pdfs/Tesis_a.pdf'], matchedBy: 'primary' }),
      readFile: async () => Uint8Array.from([1]),
      delayMs: 0
    })

    const summary = await pipeline.run('/pdfs')

    expect(summary.succeeded).toBe(1)
    expect(summary.results[0]?.warnings).toEqual(['header extraction degraded: header timeout'])
  })

  it('records empty pdfs as failures', async () => {
    const storage = createStorage()
    const grobid = createGrobid()
    const pipeline = new ThesisPipeline({
      grobid,
      storage,
      analyzer: new DocumentAnalyzer(),
      discoverFiles: async () => ({ files: ['/pdfs/Tesis_a.pdf'], matchedBy: 'primary' }),
      readFile: async () => new Uint8Array(),
      delayMs: 0
    })

    const summary = await pipeline.run('/pdfs')

    expect(summary.results[0]?.error?.code).toBe('EMPTY_FILE')
    expect(grobid.processFulltext).not.toHaveBeenCalled()
  })
})
