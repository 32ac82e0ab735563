// config/index.ts

import { defaults } from "./defaults.js";
import { buildConfig, type ConfigOverrides, type QualityConfig } from "./schema.js";

export { defaults, DEFAULT_MISSING_MARKERS } from "./defaults.js";
export { loadConfig, overridesFromEnv, type Env } from "./env.js";
export * from "./schema.js";

export function createConfig(overrides?: ConfigOverrides): QualityConfig {
  return buildConfig(defaults, overrides);
}

export const defaultConfig: QualityConfig = createConfig();
