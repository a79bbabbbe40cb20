import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { DocumentAnalyzer } from './services/analysis/document.analyzer.js'
import { GrobidClient } from './services/extract/grobid.client.js'
import { registerV1Routes } from './routes/v1/index.js'
import type { V1RouteDeps } from './routes/v1/index.js'
import { buildError, toErrorResponse } from './utils/errors.js'

export type AppDeps = Partial<V1RouteDeps>

export const createApp = (deps: AppDeps = {}) => {
  const app = new Hono()

  app.use(
    '*',
    cors({
      origin: (origin) => origin || '*',
      allowHeaders: ['Content-Type'],
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      maxAge: 600
    })
  )

  registerV1Routes(app, {
    analyzer: deps.analyzer ?? new DocumentAnalyzer(),
    grobid: deps.grobid ?? new GrobidClient()
  })

  app.notFound((c) => c.json(buildError('NOT_FOUND', 'route not found'), 404))
  app.onError((error, c) => {
    const { status, payload } = toErrorResponse(error)
    console.error(
      JSON.stringify({
        event: 'request_failed',
        path: c.req.path,
        code: payload.error.code,
        reason: error.message
      })
    )
    return c.json(payload, status)
  })

  return app
}
