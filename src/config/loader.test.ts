import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("node:fs", () => ({
  default: {
    existsSync: vi.fn(),
    readFileSync: vi.fn(),
  },
}));

vi.mock("./paths.js", () => ({
  resolveConfigFilePath: () => "/mock/.config/ccbackup/config.json5",
}));

vi.mock("../util/logger.js", () => ({
  log: { info: vi.fn(), warn: vi.fn(), debug: vi.fn(), error: vi.fn(), trace: vi.fn() },
}));

import fs from "node:fs";
import { loadConfig, resolveCredentials } from "./loader.js";
import { log } from "../util/logger.js";

describe("loadConfig", () => {
  beforeEach(() => {
    vi.stubEnv("CCBACKUP_REGION", "");
    vi.stubEnv("CCBACKUP_API_HOST", "");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.clearAllMocks();
  });

  it("returns defaults when the config file does not exist", () => {
    vi.mocked(fs.existsSync).mockReturnValue(false);
    expect(loadConfig()).toEqual({ region: "na", verifySslCert: true });
  });

  it("fails when an explicit config file is missing", () => {
    vi.mocked(fs.existsSync).mockReturnValue(false);
    expect(() => loadConfig("/test/missing.json5")).toThrow("Config file not found: /test/missing.json5");
  });

  it("loads a valid config file", () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue(
      "{ region: 'eu', credentials: { userId: 'test-user', password: 'test-secret' } }",
    );
    const config = loadConfig("/test/config.json5");
    expect(config.region).toBe("eu");
    expect(config.verifySslCert).toBe(true);
    expect(config.credentials).toEqual({ userId: "test-user", password: "test-secret" });
  });

  it("falls back to defaults on invalid JSON5", () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue("not valid json{{{");
    expect(loadConfig("/test/config.json5")).toEqual({ region: "na", verifySslCert: true });
    expect(log.warn).toHaveBeenCalledOnce();
  });

  it("falls back to defaults when the schema does not match", () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue("{ verifySslCert: 'sometimes' }");
    expect(loadConfig("/test/config.json5").verifySslCert).toBe(true);
    expect(log.warn).toHaveBeenCalledOnce();
  });

  it("merges CCBACKUP_REGION and CCBACKUP_API_HOST", () => {
    vi.stubEnv("CCBACKUP_REGION", "ap");
    vi.stubEnv("CCBACKUP_API_HOST", "api.test.local");
    vi.mocked(fs.existsSync).mockReturnValue(false);
    const config = loadConfig();
    expect(config.region).toBe("ap");
    expect(config.apiHost).toBe("api.test.local");
  });
});

describe("resolveCredentials", () => {
  beforeEach(() => {
    vi.stubEnv("DIDATA_USER", "");
    vi.stubEnv("DIDATA_PASSWORD", "");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("prefers the environment", () => {
    vi.stubEnv("DIDATA_USER", "env-user");
    vi.stubEnv("DIDATA_PASSWORD", "env-secret");
    expect(resolveCredentials({ credentials: { userId: "file-user", password: "file-secret" } })).toEqual({
      userId: "env-user",
      password: "env-secret",
    });
  });

  it("falls back to the config file", () => {
    expect(resolveCredentials({ credentials: { userId: "file-user", password: "file-secret" } })).toEqual({
      userId: "file-user",
      password: "file-secret",
    });
  });

  it("fails without a password", () => {
    vi.stubEnv("DIDATA_USER", "env-user");
    expect(() => resolveCredentials({})).toThrow("User credentials not found");
  });
});
