import type { Context } from 'hono'
import type { AnalyzeXmlRequest } from '@thesis-structure/shared'
import { sanitizePositiveNumber } from '../../config/env.js'

const MAX_XML_BYTES = sanitizePositiveNumber(Number(process.env.MAX_XML_BYTES ?? 20 * 1024 * 1024), 20 * 1024 * 1024)
const XML_CONTENT_TYPES = ['application/xml', 'text/xml', 'application/tei+xml']

export type XmlInput = { xml: string; fileName: string }

export type XmlInputResult =
  | { ok: true; value: XmlInput }
  | { ok: false; status: 400 | 413; code: 'INVALID_INPUT' | 'INPUT_TOO_LARGE'; message: string }

const invalid = (message: string): XmlInputResult => ({ ok: false, status: 400, code: 'INVALID_INPUT', message })

const tooLarge = (size: number): XmlInputResult => ({
  ok: false,
  status: 413,
  code: 'INPUT_TOO_LARGE',
  message: `xml exceeds limit: ${size} > ${MAX_XML_BYTES}`
})

export const parseXmlRequest = (
  value: unknown
): { ok: true; value: AnalyzeXmlRequest } | { ok: false; message: string } => {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return { ok: false, message: 'request body must be an object' }
  }

  const record = value as Record<string, unknown>
  const xml = record.xml
  const fileName = record.file_name

  if (typeof xml !== 'string' || xml.trim().length === 0) {
    return { ok: false, message: 'xml is required' }
  }

  if (fileName !== undefined && typeof fileName !== 'string') {
    return { ok: false, message: 'file_name must be string' }
  }

  return {
    ok: true,
    value: {
      xml,
      ...(fileName ? { file_name: fileName } : {})
    }
  }
}

/** Reads a TEI document from a raw XML body or a JSON `{ xml, file_name? }` body. */
export const readXmlInput = async (c: Context): Promise<XmlInputResult> => {
  const contentType = (c.req.header('content-type') ?? '').toLowerCase()
  const queryFileName = c.req.query('file_name') ?? ''

  if (XML_CONTENT_TYPES.some((type) => contentType.startsWith(type))) {
    const xml = await c.req.text()
    const size = Buffer.byteLength(xml, 'utf8')
    if (size > MAX_XML_BYTES) return tooLarge(size)
    if (xml.trim().length === 0) return invalid('request body is empty')
    return { ok: true, value: { xml, fileName: queryFileName } }
  }

  if (!contentType.startsWith('application/json')) {
    return invalid('content-type must be application/xml, text/xml or application/json')
  }

  let body: unknown
  try {
    body = await c.req.json()
  } catch {
    return invalid('request body must be JSON')
  }

  const parsed = parseXmlRequest(body)
  if (!parsed.ok) return invalid(parsed.message)

  const size = Buffer.byteLength(parsed.value.xml, 'utf8')
  if (size > MAX_XML_BYTES) return tooLarge(size)

  return { ok: true, value: { xml: parsed.value.xml, fileName: parsed.value.file_name ?? queryFileName } }
}
