import type { Hono } from 'hono'
import type { AnalysisResult } from '@thesis-structure/shared'
import type { DocumentAnalyzer } from '../../services/analysis/document.analyzer.js'
import { AnalysisStatus } from '../../domain/enums.js'
import { buildError } from '../../utils/errors.js'
import { readXmlInput } from './xmlInput.js'

export const registerAnalyzeRoutes = (app: Hono, analyzer: DocumentAnalyzer) => {
  app.post('/analyze', async (c) => {
    const input = await readXmlInput(c)
    if (!input.ok) {
      return c.json(buildError(input.code, input.message), input.status)
    }

    const result: AnalysisResult = analyzer.analyze(input.value.xml, input.value.fileName)
    console.info(
      JSON.stringify({
        event: 'analyze_request_completed',
        file: result.file,
        status: result.status,
        sections: result.sections.length,
        references: result.references.length
      })
    )

    return c.json(result, result.status === AnalysisStatus.SUCCESS ? 200 : 422)
  })
}
