// backend/services/item/src/bootstrap.ts
/**
 * Load .env (if any) before config.ts reads process.env. Import first.
 */

import path from "node:path";
import { config as loadEnv } from "dotenv";

loadEnv({ path: path.resolve(process.cwd(), process.env.ENV_FILE || ".env") });

export const SERVICE_NAME = "item" as const;
