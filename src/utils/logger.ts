/**
 * Structured logging via pino.
 * Signing material is redacted before it reaches any transport.
 */

import pino from "pino";
import { join } from "node:path";
import { getLogDir } from "./pathResolver.js";

const REDACT_PATHS = [
  "signature",
  "signatureBase64",
  "secretKey",
  "privateKey",
  "releasePublicKey",
  "*.signature",
  "*.signatureBase64",
  "*.secretKey",
  "*.privateKey",
  "*.releasePublicKey",
];

const logger = pino({
  name: "skillrt",
  level: process.env["SKILLRT_LOG_LEVEL"] ?? "error",
  redact: {
    paths: REDACT_PATHS,
    censor: "[REDACTED]",
  },
  ...(process.env["NODE_ENV"] === "development"
    ? {
        transport: {
          target: "pino/file",
          options: { destination: join(getLogDir(), "skillrt.log"), mkdir: true },
        },
      }
    : {}),
  timestamp: pino.stdTimeFunctions.isoTime,
});

export { logger };
