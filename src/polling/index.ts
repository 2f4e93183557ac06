/**
 * Polling Module - Public API
 */

// Types
export type { PollingScheduler, PollingSchedulerOptions, SendError } from "./schema.js";
export type { PollingError } from "./errors.js";

// Errors
export { formatPollingError } from "./errors.js";

// Service functions
export { createPollingScheduler } from "./service.js";
