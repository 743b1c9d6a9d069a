/**
 * Server configuration, read from the environment
 */

import { fileURLToPath } from 'url';
import { z } from 'zod';

export const DEFAULT_PROFILES_PATH = fileURLToPath(
  new URL('../profiles/default.json', import.meta.url)
);

const envSchema = z.object({
  // empty or blank means unset
  DAP_REGISTRY_PROFILES: z
    .string()
    .optional()
    .transform((value) => value?.trim() || undefined)
});

export interface ServerConfig {
  /** Launch-profile file registered at startup */
  profilesPath: string;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.parse(env);
  return {
    profilesPath: parsed.DAP_REGISTRY_PROFILES ?? DEFAULT_PROFILES_PATH
  };
}
