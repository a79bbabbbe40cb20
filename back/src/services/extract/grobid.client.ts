import { isEnabled, sanitizePositiveNumber } from '../../config/env.js'
import { AppError, ErrorCodes, errorMessage } from '../../utils/errors.js'

const GROBID_URL = process.env.GROBID_URL ?? 'http://127.0.0.1:8070'
const GROBID_TIMEOUT_MS = Number(process.env.GROBID_TIMEOUT_MS ?? 300_000)
const GROBID_HEADER_TIMEOUT_MS = Number(process.env.GROBID_HEADER_TIMEOUT_MS ?? 60_000)
const GROBID_ALIVE_TIMEOUT_MS = Number(process.env.GROBID_ALIVE_TIMEOUT_MS ?? 5_000)
const GROBID_MAX_BYTES = Number(process.env.GROBID_MAX_BYTES ?? 25 * 1024 * 1024)
const GROBID_CONSOLIDATE = isEnabled(process.env.GROBID_CONSOLIDATE, false)

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export type GrobidClientOptions = {
  baseUrl?: string
  timeoutMs?: number
  headerTimeoutMs?: number
  aliveTimeoutMs?: number
  maxBytes?: number
  consolidate?: boolean
  fetch?: FetchLike
}

export type TeiExtraction = {
  fileName: string
  xml: string
}

const toBlobBuffer = (value: Uint8Array): ArrayBuffer => Uint8Array.from(value).buffer

export class GrobidClient {
  readonly baseUrl: string
  private readonly timeoutMs: number
  private readonly headerTimeoutMs: number
  private readonly aliveTimeoutMs: number
  private readonly maxBytes: number
  private readonly consolidate: boolean
  private readonly fetchImpl: FetchLike

  constructor(options: GrobidClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? GROBID_URL).replace(/\/+$/, '')
    this.timeoutMs = sanitizePositiveNumber(options.timeoutMs ?? GROBID_TIMEOUT_MS, 300_000)
    this.headerTimeoutMs = sanitizePositiveNumber(options.headerTimeoutMs ?? GROBID_HEADER_TIMEOUT_MS, 60_000)
    this.aliveTimeoutMs = sanitizePositiveNumber(options.aliveTimeoutMs ?? GROBID_ALIVE_TIMEOUT_MS, 5_000)
    this.maxBytes = sanitizePositiveNumber(options.maxBytes ?? GROBID_MAX_BYTES, 25 * 1024 * 1024)
    this.consolidate = options.consolidate ?? GROBID_CONSOLIDATE
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init))
  }

  async isAlive(): Promise<boolean> {
    try {
      return await this.fetchWithTimeout(
        `${this.baseUrl}/api/isalive`,
        { method: 'GET' },
        this.aliveTimeoutMs,
        async (response) => response.ok
      )
    } catch (error) {
      console.warn(
        JSON.stringify({
          event: 'grobid_unreachable',
          baseUrl: this.baseUrl,
          reason: errorMessage(error)
        })
      )
      return false
    }
  }

  /** Full-text TEI (header, body sections and bibliography) for one PDF. */
  processFulltext(pdf: Uint8Array, fileName: string): Promise<TeiExtraction> {
    return this.process('processFulltextDocument', pdf, fileName, this.timeoutMs)
  }

  /** Header-only TEI: title, authors, date and abstract. */
  processHeader(pdf: Uint8Array, fileName: string): Promise<TeiExtraction> {
    return this.process('processHeaderDocument', pdf, fileName, this.headerTimeoutMs)
  }

  private async process(
    service: 'processFulltextDocument' | 'processHeaderDocument',
    pdf: Uint8Array,
    fileName: string,
    timeoutMs: number
  ): Promise<TeiExtraction> {
    if (pdf.length > this.maxBytes) {
      throw new AppError(ErrorCodes.INPUT_TOO_LARGE, `grobid input exceeds limit: ${pdf.length} > ${this.maxBytes}`, 413, {
        fileName
      })
    }

    const form = new FormData()
    form.append('input', new Blob([toBlobBuffer(pdf)], { type: 'application/pdf' }), fileName)
    if (this.consolidate) {
      form.append('consolidateHeader', '1')
      form.append('consolidateCitations', '1')
    }

    const url = `${this.baseUrl}/api/${service}`
    let response: { ok: boolean; status: number; xml: string }
    try {
      response = await this.fetchWithTimeout(url, { method: 'POST', body: form }, timeoutMs, async (res) => ({
        ok: res.ok,
        status: res.status,
        xml: await res.text()
      }))
    } catch (error) {
      if (error instanceof AppError) throw error
      throw new AppError(ErrorCodes.GROBID_UNAVAILABLE, `grobid request failed: ${errorMessage(error)}`, 502, {
        service,
        fileName
      })
    }

    const { xml } = response
    if (!response.ok) {
      throw new AppError(ErrorCodes.GROBID_FAILED, `grobid failed: ${response.status}`, 502, {
        service,
        fileName,
        status: response.status,
        body: xml.slice(0, 200)
      })
    }

    return { fileName, xml }
  }

  // The deadline covers reading the body as well as receiving the headers.
  private async fetchWithTimeout<T>(
    url: string,
    init: RequestInit,
    timeoutMs: number,
    read: (response: Response) => Promise<T>
  ): Promise<T> {
    const controller = new AbortController()
    const timer = setTimeout(() => controller.abort(), timeoutMs)
    try {
      const response = await this.fetchImpl(url, {
        ...init,
        signal: controller.signal
      })
      return await read(response)
    } catch (error) {
      if (controller.signal.aborted) {
        throw new AppError(ErrorCodes.GROBID_TIMEOUT, `request timeout after ${timeoutMs}ms`, 504, { url })
      }
      throw error
    } finally {
      clearTimeout(timer)
    }
  }
}
