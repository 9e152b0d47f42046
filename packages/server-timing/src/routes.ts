import { Hono } from 'hono'
import { snapshotTimer, type ScopeTimer } from '@scopewatch/timing'

/**
 * Read-only view of a timer tree.
 *
 *   GET /      JSON snapshot of the tree
 *   GET /text  rendered tree as text/plain
 */
export function timingRoutes(root: ScopeTimer): Hono {
  const routes = new Hono()

  routes.get('/', (c) => c.json(snapshotTimer(root)))

  routes.get('/text', (c) => c.text(root.render()))

  return routes
}
