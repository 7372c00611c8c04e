import { join } from "node:path";
import { defaultStoreFileName, resolveProbeSettings } from "../../core/settings.js";
import type { ProbeSettingsOverrides, SettingsEnv } from "../../core/settings.js";
import { FileRunStore } from "./fileRunStore.js";

export interface LocalStoreOptions {
  target: string;
  dataDir?: string;
  settings?: ProbeSettingsOverrides;
  env?: SettingsEnv;
}

/**
 * Opens the JSON store configured in the probe settings, or
 * `<dataDir>/<target>-output.json` when none is set.
 */
export function openLocalRunStore(options: LocalStoreOptions): FileRunStore {
  const settings = resolveProbeSettings(options.settings, options.env);
  const path =
    settings.storePath ??
    join(options.dataDir ?? process.cwd(), defaultStoreFileName(options.target));

  return new FileRunStore(path, { expectedTries: settings.expectedTries });
}

export { FileRunStore };
