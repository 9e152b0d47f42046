// Hono integration: request timing middleware and timing routes

export {
  requestTimer,
  createRequestRoot,
  defaultRequestKey,
  toTimerName,
  UNMATCHED_ROUTE,
  type RequestTimerOptions,
} from './request-timer'

export { timingRoutes } from './routes'
