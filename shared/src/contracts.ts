export type SectionCategory =
  | 'resumen_abstract'
  | 'introduccion'
  | 'antecedentes_estado_arte'
  | 'objetivos'
  | 'justificacion_hipotesis'
  | 'metodologia'
  | 'resultados_analisis'
  | 'conclusiones'
  | 'referencias'
  | 'otro'

export type DocumentLanguage = 'spanish' | 'english' | 'unknown'

export type AnalysisStatus = 'success' | 'error'

export type ApiError = {
  error: {
    code: string
    message: string
    details?: Record<string, unknown>
  }
}

export type DocumentMetadata = {
  title: string
  authors: string[]
  date: string
  abstract: string
}

export type DocumentSection = {
  index: number
  heading: string
  body: string
  category: SectionCategory
  language: DocumentLanguage
}

export type DocumentReference = {
  key: string
  raw: string
  title: string
  authors: string
  year: string
}

// Section indices of one category, in document order.
export type CategoryGroup = {
  category: SectionCategory
  sections: number[]
}

export type AnalysisError = {
  code: string
  message: string
}

export type AnalysisResult = {
  schemaVersion: 'v1'
  file: string
  status: AnalysisStatus
  metadata: DocumentMetadata
  sections: DocumentSection[]
  sectionsByCategory: CategoryGroup[]
  references: DocumentReference[]
  // Every body paragraph joined with single spaces.
  fullText: string
  language: DocumentLanguage
  warnings: string[]
  error: AnalysisError | null
}

export type BatchResult = {
  schemaVersion: 'v1'
  directory: string
  total: number
  succeeded: number
  failed: number
  results: AnalysisResult[]
  warnings: string[]
}

export type AnalyzeXmlRequest = {
  xml: string
  file_name?: string
}

export type ProcessPdfResponse = AnalysisResult

export type HealthResponse = 'ok'
