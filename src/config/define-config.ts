import type { Config, ConfigFileInput, ConfigInput } from './schema';
import { configSchema } from './schema';

export type { Config, ConfigFileInput, ConfigInput };

/** Typed helper for `roadmap.config.js` files. */
export function defineConfig(config: ConfigFileInput): ConfigFileInput {
  return config;
}

export { configSchema };
