import type { Hono } from 'hono'
import type { DocumentAnalyzer } from '../../services/analysis/document.analyzer.js'
import { generateStructuredXml, serializeXml } from '../../services/structure/structured-xml.generator.js'
import { AnalysisStatus } from '../../domain/enums.js'
import { buildError } from '../../utils/errors.js'
import { readXmlInput } from './xmlInput.js'

export const registerStructureRoutes = (app: Hono, analyzer: DocumentAnalyzer) => {
  app.post('/structure', async (c) => {
    const input = await readXmlInput(c)
    if (!input.ok) {
      return c.json(buildError(input.code, input.message), input.status)
    }

    const result = analyzer.analyze(input.value.xml, input.value.fileName)
    if (result.status !== AnalysisStatus.SUCCESS) {
      return c.json(result, 422)
    }

    return c.body(serializeXml(generateStructuredXml(result)), 200, {
      'Content-Type': 'application/xml; charset=utf-8'
    })
  })
}
