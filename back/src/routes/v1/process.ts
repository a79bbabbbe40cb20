import type { Hono } from 'hono'
import type { ProcessPdfResponse } from '@thesis-structure/shared'
import type { DocumentAnalyzer } from '../../services/analysis/document.analyzer.js'
import type { GrobidClient } from '../../services/extract/grobid.client.js'
import { parseXml } from '../../services/tei/xml.parser.js'
import { AnalysisStatus } from '../../domain/enums.js'
import { buildError, toErrorResponse } from '../../utils/errors.js'

type GrobidPort = Pick<GrobidClient, 'processFulltext'>

type UploadedFile = {
  name: string
  arrayBuffer: () => Promise<ArrayBuffer>
}

const takeFirst = (value: unknown): unknown => (Array.isArray(value) ? value[0] : value)

const isUploadedFile = (value: unknown): value is UploadedFile => {
  if (!value || typeof value !== 'object') return false
  const candidate = value as UploadedFile
  return typeof candidate.name === 'string' && typeof candidate.arrayBuffer === 'function'
}

export const registerProcessRoutes = (app: Hono, analyzer: DocumentAnalyzer, grobid: GrobidPort) => {
  app.post('/process', async (c) => {
    const contentType = c.req.header('content-type') ?? ''
    if (!contentType.toLowerCase().startsWith('multipart/form-data')) {
      return c.json(buildError('INVALID_INPUT', 'content-type must be multipart/form-data for process'), 400)
    }

    let body: Awaited<ReturnType<typeof c.req.parseBody>>
    try {
      body = await c.req.parseBody({ all: true })
    } catch {
      return c.json(buildError('INVALID_INPUT', 'invalid multipart body'), 400)
    }

    const fileValue = takeFirst(body.file)
    if (!isUploadedFile(fileValue)) {
      return c.json(buildError('INVALID_INPUT', 'file is required in multipart body'), 400)
    }
    if (!fileValue.name.toLowerCase().endsWith('.pdf')) {
      return c.json(buildError('DISALLOWED_FILE_TYPE', 'file extension must be .pdf'), 400)
    }

    const pdf = new Uint8Array(await fileValue.arrayBuffer())
    if (pdf.length === 0) {
      return c.json(buildError('EMPTY_FILE', 'file is empty'), 400)
    }

    let tree: ReturnType<typeof parseXml>
    try {
      const extraction = await grobid.processFulltext(pdf, fileValue.name)
      tree = parseXml(extraction.xml)
    } catch (error) {
      const { status, payload } = toErrorResponse(error, 'failed to extract tei')
      console.warn(
        JSON.stringify({
          event: 'process_request_failed',
          file: fileValue.name,
          code: payload.error.code,
          reason: payload.error.message
        })
      )
      return c.json(payload, status)
    }

    const result: ProcessPdfResponse = analyzer.analyze(tree, fileValue.name)
    return c.json(result, result.status === AnalysisStatus.SUCCESS ? 200 : 422)
  })
}
