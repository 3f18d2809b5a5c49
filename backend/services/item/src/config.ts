// backend/services/item/src/config.ts

/**
 * - No dotenv loading here (bootstrap.ts loads env).
 * - No hardcoded defaults for required vars; fail fast at import time.
 */

import { optionalEnv, parseLogLevel, requireEnv, requireNumber } from "@restset/shared";

export const config = {
  env: process.env.NODE_ENV,

  // required
  serviceName: requireEnv("ITEM_SERVICE_NAME"),
  port: requireNumber("ITEM_PORT"),

  // optional
  logLevel: parseLogLevel(optionalEnv("LOG_LEVEL")),
} as const;
