import { createRegistry } from "../schema/registry.js";
import type { BridgeConfig } from "../types/config.js";

export type ConfigValidationResult = {
  valid: boolean;
  errors: string | null;
};

/** Validate a config object against schemas/config.schema.json. */
export function validateConfig(config: unknown): ConfigValidationResult {
  return createRegistry().validate("config", config);
}

export function isBridgeConfig(config: unknown): config is BridgeConfig {
  return createRegistry().guard<BridgeConfig>("config").check(config);
}
