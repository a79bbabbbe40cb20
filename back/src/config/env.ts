export const sanitizePositiveNumber = (value: number, fallback: number): number => {
  if (!Number.isFinite(value)) return fallback
  const normalized = Math.floor(value)
  if (normalized <= 0) return fallback
  return normalized
}

export const sanitizeRatio = (value: number, fallback: number): number => {
  if (!Number.isFinite(value)) return fallback
  if (value < 0 || value > 1) return fallback
  return value
}

export const isEnabled = (value: string | undefined, fallback: boolean): boolean =>
  value === undefined ? fallback : value !== '0'
