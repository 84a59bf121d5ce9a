// src/lib/bootstrap.ts
import { createLogger } from "@lib/logger";

// Shared logger for CLIs (pure; no side effects)
export const log = createLogger();
