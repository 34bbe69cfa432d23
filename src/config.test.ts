import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { DEFAULT_ENDPOINT, DEFAULT_MODEL, loadConfig, requireApiKey } from "./config.js";
import { ConfigError } from "./utils/errors.js";

describe("loadConfig", () => {
  let home: string;

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), "promptlog-config-"));
  });

  afterEach(() => {
    fs.rmSync(home, { recursive: true, force: true });
  });

  const writeSettings = (content: string): string => {
    const dir = path.join(home, ".config", "gemini");
    fs.mkdirSync(dir, { recursive: true });
    const file = path.join(dir, "config");
    fs.writeFileSync(file, content, "utf-8");
    return file;
  };

  it("falls back to defaults without a settings file", () => {
    const config = loadConfig({ homeDir: home, env: {} });

    expect(config).toEqual({
      config_file: path.join(home, ".config", "gemini", "config"),
      default_model: DEFAULT_MODEL,
      api: { endpoint: DEFAULT_ENDPOINT, api_key: undefined, timeout_ms: 60_000 },
      history: {
        file: path.join(home, ".config", "gemini", "conversation_history.json"),
        mirror_dir: undefined,
      },
    });
  });

  it("reads shell-style assignments from the settings file", () => {
    writeSettings(
      [
        'API_KEY="test-secret"',
        "MODEL=gemini-1.5-flash",
        "LOG_FILE=~/logs/history.json",
        "MIRROR_DIR=~/backup",
        "TIMEOUT_MS=1500",
      ].join("\n"),
    );

    const config = loadConfig({ homeDir: home, env: {} });
    expect(config.api.api_key).toBe("test-secret");
    expect(config.default_model).toBe("gemini-1.5-flash");
    expect(config.api.timeout_ms).toBe(1500);
    expect(config.history.file).toBe(path.join(home, "logs", "history.json"));
    expect(config.history.mirror_dir).toBe(path.join(home, "backup"));
  });

  it("lets the environment override the settings file", () => {
    writeSettings('API_KEY="from-file"\nMODEL=gemini-1.0-pro');

    const config = loadConfig({
      homeDir: home,
      env: {
        GEMINI_API_KEY: "from-env",
        PROMPTLOG_MODEL: "gemini-1.5-pro",
        PROMPTLOG_LOG_FILE: path.join(home, "elsewhere.json"),
      },
    });
    expect(config.api.api_key).toBe("from-env");
    expect(config.default_model).toBe("gemini-1.5-pro");
    expect(config.history.file).toBe(path.join(home, "elsewhere.json"));
  });

  it("honours an explicit settings path", () => {
    const file = path.join(home, "custom.env");
    fs.writeFileSync(file, "API_KEY=test-secret\n", "utf-8");

    const config = loadConfig({ homeDir: home, env: { PROMPTLOG_CONFIG: file } });
    expect(config.config_file).toBe(file);
    expect(config.api.api_key).toBe("test-secret");
  });

  it("rejects invalid values", () => {
    writeSettings("TIMEOUT_MS=soon");
    expect(() => loadConfig({ homeDir: home, env: {} })).toThrow(ConfigError);
  });
});

describe("requireApiKey", () => {
  it("explains where the key is expected", () => {
    const config = loadConfig({ homeDir: os.tmpdir(), env: {}, configPath: "/nonexistent/config" });
    expect(() => requireApiKey(config)).toThrow(
      "No API key found in /nonexistent/config or GEMINI_API_KEY",
    );
  });
});
