import { describe, it, expect, vi, afterEach } from "vitest";
import path from "node:path";
import os from "node:os";
import { resolveConfigDir, resolveConfigFilePath } from "./paths.js";

describe("config paths", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("honors CCBACKUP_HOME", () => {
    vi.stubEnv("CCBACKUP_HOME", "/srv/ccbackup");
    expect(resolveConfigDir()).toBe("/srv/ccbackup");
    vi.stubEnv("CCBACKUP_CONFIG", "");
    expect(resolveConfigFilePath()).toBe(path.join("/srv/ccbackup", "config.json5"));
  });

  it("uses XDG_CONFIG_HOME when set", () => {
    vi.stubEnv("CCBACKUP_HOME", "");
    vi.stubEnv("XDG_CONFIG_HOME", "/home/test/.xdg");
    expect(resolveConfigDir()).toBe(path.join("/home/test/.xdg", "ccbackup"));
  });

  it("falls back to ~/.config", () => {
    vi.stubEnv("CCBACKUP_HOME", "");
    vi.stubEnv("XDG_CONFIG_HOME", "");
    expect(resolveConfigDir()).toBe(path.join(os.homedir(), ".config", "ccbackup"));
  });

  it("prefers CCBACKUP_CONFIG for the file", () => {
    vi.stubEnv("CCBACKUP_CONFIG", "/etc/ccbackup.json5");
    expect(resolveConfigFilePath()).toBe("/etc/ccbackup.json5");
  });
});
