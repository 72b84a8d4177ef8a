export { APIServer } from './server.js';
export { createAuthMiddleware, createCorsMiddleware, generateApiKey, verifyApiKey } from './auth.js';
export type { RequestHandler } from './auth.js';
export type { APIError, APIServerConfig, FeedbackResponse, HealthResponse, StrategySummary } from './types.js';
