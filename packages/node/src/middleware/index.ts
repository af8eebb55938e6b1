/**
 * Middleware barrel: re-exports all middleware.
 */

export { createErrorHandler, handleNotFound, STATUS_MAP } from "./error-handler.js";
export {
  requestIdMiddleware,
  isValidRequestId,
  REQUEST_ID_HEADER,
} from "./request-id.js";
export { loggerMiddleware, pinoRequestLog } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody } from "./validate.js";
export {
  managementAuthMiddleware,
  createAuthConfig,
  permissionForMethod,
  isManagementPath,
  MANAGEMENT_PREFIXES,
  API_KEY_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
export {
  metricsMiddleware,
  MetricsCollector,
  escapeLabelValue,
  OVERFLOW_LABEL_VALUE,
} from "./metrics.js";
export type { CounterOptions } from "./metrics.js";
export { webhookSignatureMiddleware, SIGNATURE_HEADER } from "./webhook-signature.js";
export type { WebhookSignatureOptions } from "./webhook-signature.js";
