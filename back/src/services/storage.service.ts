import { mkdir, readFile, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { Storage } from '@google-cloud/storage'
import { AppError, ErrorCodes } from '../utils/errors.js'

const DEFAULT_LOCAL_ROOT = 'output'

type StorageServiceOptions = {
  // Objects go to this Cloud Storage bucket instead of the local root when set.
  bucketName?: string
  localRoot?: string
  client?: Storage
}

export type PutTextInput = {
  objectPath: string
  text: string
  contentType?: string
}

const assertSafeObjectPath = (objectPath: string): string => {
  const normalized = objectPath.replace(/\\/g, '/').replace(/^\/+/, '')
  if (!normalized || normalized.includes('\0')) {
    throw new AppError(ErrorCodes.INVALID_INPUT, 'invalid storage path', 400, { objectPath })
  }

  const segments = normalized.split('/')
  if (segments.some((segment) => segment === '..')) {
    throw new AppError(ErrorCodes.INVALID_INPUT, 'unsafe storage path', 400, { objectPath })
  }

  return normalized
}

/**
 * Persistence sink for TEI files, analysis JSON and structured XML. Writes under a local
 * directory, or to Cloud Storage when a bucket is configured.
 */
export class StorageService {
  private readonly bucketName: string | undefined
  private readonly localRoot: string
  private client: Storage | undefined

  constructor(options: StorageServiceOptions = {}) {
    this.bucketName = options.bucketName ?? process.env.BUCKET_NAME
    this.localRoot = options.localRoot ?? process.env.LOCAL_STORAGE_ROOT ?? DEFAULT_LOCAL_ROOT
    this.client = options.client
  }

  describe(objectPath: string): string {
    const normalizedPath = assertSafeObjectPath(objectPath)
    return this.bucketName ? `gs://${this.bucketName}/${normalizedPath}` : this.resolveLocalPath(normalizedPath)
  }

  async putText(input: PutTextInput): Promise<string> {
    const normalizedPath = assertSafeObjectPath(input.objectPath)
    const contentType = input.contentType ?? 'text/plain; charset=utf-8'

    if (this.bucketName) {
      await this.getClient().bucket(this.bucketName).file(normalizedPath).save(input.text, {
        contentType,
        resumable: false
      })
      return `gs://${this.bucketName}/${normalizedPath}`
    }

    const targetPath = this.resolveLocalPath(normalizedPath)
    await mkdir(path.dirname(targetPath), { recursive: true })
    await writeFile(targetPath, input.text, 'utf8')
    return targetPath
  }

  putJson(objectPath: string, value: unknown): Promise<string> {
    return this.putText({
      objectPath,
      text: `${JSON.stringify(value, null, 2)}\n`,
      contentType: 'application/json'
    })
  }

  putXml(objectPath: string, xml: string): Promise<string> {
    return this.putText({ objectPath, text: xml, contentType: 'application/xml; charset=utf-8' })
  }

  async readAsBuffer(objectPath: string): Promise<Buffer> {
    const normalizedPath = assertSafeObjectPath(objectPath)

    try {
      if (this.bucketName) {
        const [contents] = await this.getClient().bucket(this.bucketName).file(normalizedPath).download()
        return contents
      }
      return await readFile(this.resolveLocalPath(normalizedPath))
    } catch (error) {
      throw new AppError(ErrorCodes.STORAGE_NOT_FOUND, 'storage object not found', 404, {
        objectPath: normalizedPath,
        reason: error instanceof Error ? error.message : 'unknown'
      })
    }
  }

  private getClient(): Storage {
    if (!this.client) {
      const projectId = process.env.GCP_PROJECT_ID
      this.client = new Storage(projectId ? { projectId } : {})
    }
    return this.client
  }

  private resolveLocalPath(objectPath: string): string {
    const fullPath = path.resolve(this.localRoot, objectPath)
    const root = path.resolve(this.localRoot)
    if (!fullPath.startsWith(`${root}${path.sep}`) && fullPath !== root) {
      throw new AppError(ErrorCodes.INVALID_INPUT, 'unsafe storage path', 400, { objectPath })
    }
    return fullPath
  }
}
