import { homedir } from "node:os";
import { resolve } from "node:path";
import {
  ENV_HOME,
  ENV_KEY_FILE,
  ENV_SETTINGS_FILE,
  KEY_FILE_NAME,
  QrPassError,
  SETTINGS_FILE_NAME,
  appEnvSchema,
} from "@qr-pass/shared";

export interface AppPaths {
  keyPath: string;
  settingsPath: string;
  /** Base for the default save directory. */
  homeDir: string;
}

export interface ResolveAppPathsOptions {
  /** Directory the key and settings files live in. Defaults to the working directory. */
  baseDir?: string;
  homeDir?: string;
  env?: Record<string, string | undefined>;
}

/**
 * Resolve on-disk locations. Environment overrides win over defaults;
 * relative overrides resolve against `baseDir`.
 */
export function resolveAppPaths(options: ResolveAppPathsOptions = {}): AppPaths {
  const baseDir = options.baseDir ?? process.cwd();
  const parsed = appEnvSchema.safeParse(options.env ?? process.env);
  if (!parsed.success) {
    const field = parsed.error.issues[0]?.path.join(".") ?? "environment";
    throw QrPassError.invalidSetting(field, undefined);
  }
  const env = parsed.data;

  return {
    keyPath: resolve(baseDir, env[ENV_KEY_FILE] ?? KEY_FILE_NAME),
    settingsPath: resolve(baseDir, env[ENV_SETTINGS_FILE] ?? SETTINGS_FILE_NAME),
    homeDir: resolve(baseDir, env[ENV_HOME] ?? options.homeDir ?? homedir()),
  };
}
