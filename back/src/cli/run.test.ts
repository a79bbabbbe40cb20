import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { summarizeBatch } from '../services/analysis/document.analyzer.js'
import { StorageService } from '../services/storage.service.js'
import { MALFORMED_TEI, MINIMAL_TEI } from '../test/teiSamples.js'
import { runCli, USAGE } from './run.js'

describe('runCli', () => {
  let workspace = ''
  let stdout: string[]
  let stderr: string[]

  const io = () => ({
    stdout: (line: string) => {
      stdout.push(line)
    },
    stderr: (line: string) => {
      stderr.push(line)
    }
  })

  beforeEach(async () => {
    workspace = await mkdtemp(path.join(os.tmpdir(), 'thesis-cli-'))
    stdout = []
    stderr = []
    vi.spyOn(console, 'info').mockImplementation(() => undefined)
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await rm(workspace, { recursive: true, force: true })
  })

  it('prints usage for unknown commands', async () => {
    expect(await runCli([], io())).toBe(1)
    expect(await runCli(['convert', 'x'], io())).toBe(1)
    expect(stderr).toEqual([USAGE, USAGE])
  })

  it('analyzes a directory and writes the batch and structured xml', async () => {
    const input = path.join(workspace, 'tei')
    const output = path.join(workspace, 'out')
    await mkdir(input)
    await writeFile(path.join(input, 'a.xml'), MINIMAL_TEI)
    await writeFile(path.join(input, 'b.xml'), MALFORMED_TEI)

    const outJson = path.join(output, 'result.json')
    expect(await runCli(['analyze', input, outJson], io())).toBe(0)

    const batch: unknown = JSON.parse(await readFile(outJson, 'utf8'))
    expect(batch).toMatchObject({ directory: input, total: 2, succeeded: 1, failed: 1 })
    expect(await readFile(path.join(output, 'a_structured.xml'), 'utf8')).toContain('categoria="conclusiones"')
    await expect(readFile(path.join(output, 'b_structured.xml'), 'utf8')).rejects.toThrow()
    expect(stdout).toEqual([`wrote ${outJson}`, '2 file(s): 1 succeeded, 1 failed'])
  })

  it('runs the pdf pipeline into the output directory', async () => {
    const run = vi.fn(async (directory: string) => summarizeBatch(directory, [], ['no candidate files found in /pdfs']))
    const output = path.join(workspace, 'out')

    const code = await runCli(['process', '/pdfs', output], {
      ...io(),
      createStorage: (localRoot) => new StorageService({ localRoot }),
      createPipeline: () => ({ run })
    })

    expect(code).toBe(0)
    expect(run).toHaveBeenCalledWith('/pdfs')
    expect(stderr).toEqual(['warning: no candidate files found in /pdfs'])
    expect(stdout).toEqual([`wrote ${path.join(output, 'thesis_analysis.json')}`, '0 file(s): 0 succeeded, 0 failed'])
  })

  it('reports failures with exit code 1', async () => {
    const code = await runCli(['process', '/pdfs'], {
      ...io(),
      createPipeline: () => ({
        run: async () => {
          throw new Error('disk full')
        }
      })
    })

    expect(code).toBe(1)
    expect(stderr).toEqual(['error: disk full'])
  })
})
