import type { Hono } from 'hono'
import type { HealthResponse } from '@thesis-structure/shared'

const HEALTHY: HealthResponse = 'ok'

export const registerHealthRoutes = (app: Hono) => {
  for (const path of ['/healthz', '/health']) {
    app.get(path, (c) => c.text(HEALTHY, 200))
  }
}
