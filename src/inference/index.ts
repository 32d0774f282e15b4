/**
 * Inference — barrel export.
 */

export { InferenceHub } from "./hub.js";
export type { IInferenceHubOptions, IHubStats } from "./hub.js";
export { InferenceSession } from "./session.js";
export type { IRunCounters, IIdleSource } from "./session.js";
export { EchoBackend, OffsetBackend, createBackendFactory } from "./backends.js";
export type { IInferenceBackend, BackendFactory } from "./backends.js";
