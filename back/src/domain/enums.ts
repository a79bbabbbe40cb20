import type { AnalysisStatus as AnalysisStatusValue, DocumentLanguage, SectionCategory as SectionCategoryValue } from '@thesis-structure/shared'

export const SectionCategory = {
  RESUMEN_ABSTRACT: 'resumen_abstract',
  INTRODUCCION: 'introduccion',
  ANTECEDENTES_ESTADO_ARTE: 'antecedentes_estado_arte',
  OBJETIVOS: 'objetivos',
  JUSTIFICACION_HIPOTESIS: 'justificacion_hipotesis',
  METODOLOGIA: 'metodologia',
  RESULTADOS_ANALISIS: 'resultados_analisis',
  CONCLUSIONES: 'conclusiones',
  REFERENCIAS: 'referencias',
  OTRO: 'otro'
} as const satisfies Record<string, SectionCategoryValue>

export type SectionCategory = (typeof SectionCategory)[keyof typeof SectionCategory]

export const SECTION_CATEGORIES: readonly SectionCategory[] = Object.values(SectionCategory)

export const Language = {
  SPANISH: 'spanish',
  ENGLISH: 'english',
  UNKNOWN: 'unknown'
} as const satisfies Record<string, DocumentLanguage>

export type Language = (typeof Language)[keyof typeof Language]

export const AnalysisStatus = {
  SUCCESS: 'success',
  ERROR: 'error'
} as const satisfies Record<string, AnalysisStatusValue>

export type AnalysisStatus = (typeof AnalysisStatus)[keyof typeof AnalysisStatus]

export const CategoryMatchBasis = {
  HEADING_KEYWORD: 'heading_keyword',
  HEADING_SIMILARITY: 'heading_similarity',
  BODY_KEYWORD: 'body_keyword',
  NONE: 'none'
} as const

export type CategoryMatchBasis = (typeof CategoryMatchBasis)[keyof typeof CategoryMatchBasis]
