export { TelemetrySink, EVENTS_FILE_NAME, SHARE_IN_EVENT, TTS_EVENT } from "./telemetry-sink.js";
export type { ITelemetrySinkOptions } from "./telemetry-sink.js";
export { SamplingConfig } from "./sampling.js";
export type { SamplingInput, RandomSource } from "./sampling.js";
