import { resolveDialect } from "./dialects.js";
import { InvalidProbeSettingsError } from "./errors.js";
import type { Dialect } from "./types.js";

export interface ProbeSettings {
  dialect: Dialect;
  expectedTries: number;
  storePath?: string;
}

export interface ProbeSettingsOverrides {
  dialect?: string;
  expectedTries?: number;
  storePath?: string;
}

export type SettingsEnv = Record<string, string | undefined>;

export const DEFAULT_PROBE_SETTINGS: ProbeSettings = Object.freeze({
  dialect: "modern",
  expectedTries: 3,
});

export const SETTINGS_ENV_VARS = Object.freeze({
  dialect: "HOPSCOPE_DIALECT",
  expectedTries: "HOPSCOPE_TRIES",
  storePath: "HOPSCOPE_STORE_PATH",
});

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parseTries(raw: string | number): number {
  const value = typeof raw === "number" ? raw : Number(raw.trim());
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidProbeSettingsError(
      `Probes per hop must be a positive integer, got "${raw}".`,
    );
  }
  return value;
}

/** Store file used when no store path is configured. */
export function defaultStoreFileName(target: string): string {
  return `${target.trim()}-output.json`;
}

export function resolveProbeSettings(
  overrides: ProbeSettingsOverrides = {},
  env: SettingsEnv = process.env,
): ProbeSettings {
  const dialectName = overrides.dialect ?? nonEmpty(env[SETTINGS_ENV_VARS.dialect]);
  const triesValue = overrides.expectedTries ?? nonEmpty(env[SETTINGS_ENV_VARS.expectedTries]);
  const storePath = overrides.storePath ?? nonEmpty(env[SETTINGS_ENV_VARS.storePath]);

  const settings: ProbeSettings = {
    dialect:
      dialectName === undefined ? DEFAULT_PROBE_SETTINGS.dialect : resolveDialect(dialectName),
    expectedTries:
      triesValue === undefined ? DEFAULT_PROBE_SETTINGS.expectedTries : parseTries(triesValue),
  };
  if (storePath !== undefined) {
    settings.storePath = storePath;
  }
  return settings;
}
