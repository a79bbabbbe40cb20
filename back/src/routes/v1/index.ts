import { Hono } from 'hono'
import type { DocumentAnalyzer } from '../../services/analysis/document.analyzer.js'
import type { GrobidClient } from '../../services/extract/grobid.client.js'
import { registerAnalyzeRoutes } from './analyze.js'
import { registerHealthRoutes } from './health.js'
import { registerProcessRoutes } from './process.js'
import { registerStructureRoutes } from './structure.js'

export type V1RouteDeps = {
  analyzer: DocumentAnalyzer
  grobid: Pick<GrobidClient, 'processFulltext'>
}

export const registerV1Routes = (app: Hono, deps: V1RouteDeps) => {
  const v1 = new Hono()

  registerAnalyzeRoutes(v1, deps.analyzer)
  registerStructureRoutes(v1, deps.analyzer)
  registerProcessRoutes(v1, deps.analyzer, deps.grobid)
  registerHealthRoutes(v1)

  app.route('/v1', v1)
}
