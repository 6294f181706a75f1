export * from './server/index.js';
export { Router } from './router/router.js';
export { createApiRouter } from './routes/index.js';
export * from './events/sse.js';
export { ok, failure, readJsonBody, statusForCode, toErrorResponse } from './http/http_helpers.js';
