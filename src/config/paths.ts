import path from "node:path";
import os from "node:os";

const CONFIG_DIR_NAME = "ccbackup";

export function resolveConfigDir(): string {
  const override = process.env.CCBACKUP_HOME?.trim();
  if (override) return override;
  const xdgConfig = process.env.XDG_CONFIG_HOME?.trim();
  const base = xdgConfig || path.join(os.homedir(), ".config");
  return path.join(base, CONFIG_DIR_NAME);
}

export function resolveConfigFilePath(): string {
  const override = process.env.CCBACKUP_CONFIG?.trim();
  if (override) return override;
  return path.join(resolveConfigDir(), "config.json5");
}

