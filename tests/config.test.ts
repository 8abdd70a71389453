import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, describe, expect, it } from "vitest";
import {
  getDefaultConfig,
  getWebhookConfig,
  loadEngineConfig,
  parseEngineConfig
} from "../src/config.js";
import { ConfigError } from "../src/errors.js";

const exampleConfig = fileURLToPath(new URL("../config/tollgate.yaml", import.meta.url));

describe("engine configuration", () => {
  const tempDirs: string[] = [];

  afterEach(() => {
    for (const dir of tempDirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  const writeTemp = (content: string): string => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "tollgate-config-"));
    tempDirs.push(dir);
    const file = path.join(dir, "config.yaml");
    fs.writeFileSync(file, content);
    return file;
  };

  it("fills every missing key with its default", () => {
    const config = parseEngineConfig({});

    expect(config.types.issue).toEqual({
      actions: ["opened", "edited"],
      batchSize: 5,
      minTokens: 100,
      maxTokens: 8000,
      batchTokenBudget: 20000
    });
    expect(config.types.pull_request.actions).toEqual(["opened", "synchronize"]);
    expect(config.cost).toEqual({ targetHourlyRate: 10, maxHourlyRate: 15, maxTotalCost: null });
    expect(config.dispatch.mode).toBe("batch");
    expect(config.dispatch.command).toEqual([]);
    expect(config.retention.horizonDays).toBe(30);
    expect(config.stateCache).toEqual({ ttlMs: 3_600_000 });
  });

  it("applies environment overrides over the file", () => {
    const config = parseEngineConfig(
      { cost: { target_hourly_rate: 5, max_hourly_rate: 8 } },
      {
        TOLLGATE_MAX_HOURLY_RATE: "20",
        TOLLGATE_MAX_TOTAL_COST: "500",
        TOLLGATE_ENGINE_COMMAND: "./run-agent --batch"
      }
    );

    expect(config.cost).toEqual({ targetHourlyRate: 5, maxHourlyRate: 20, maxTotalCost: 500 });
    expect(config.dispatch.command).toEqual(["./run-agent", "--batch"]);
  });

  it("reads an engine command given as a JSON array", () => {
    const config = parseEngineConfig({}, { TOLLGATE_ENGINE_COMMAND: '["./run agent", "--json"]' });

    expect(config.dispatch.command).toEqual(["./run agent", "--json"]);
  });

  it("rejects a ceiling below the target", () => {
    expect(() =>
      parseEngineConfig({ cost: { target_hourly_rate: 10, max_hourly_rate: 5 } })
    ).toThrow(
      new ConfigError(
        "Invalid configuration: cost: max_hourly_rate must be at least target_hourly_rate"
      )
    );
  });

  it("rejects malformed overrides and documents", () => {
    expect(() => parseEngineConfig({}, { TOLLGATE_TARGET_HOURLY_RATE: "abc" })).toThrow(
      'TOLLGATE_TARGET_HOURLY_RATE must be a number, got "abc"'
    );
    expect(() => parseEngineConfig(["not", "a", "mapping"])).toThrow(
      "Configuration must be a mapping"
    );
    expect(() => parseEngineConfig({ dispatch: { mode: "sometimes" } })).toThrow(ConfigError);
  });

  it("loads the example policy file", () => {
    const config = loadEngineConfig(exampleConfig, { required: true, env: {} });

    expect(config.types.pull_request.batchSize).toBe(3);
    expect(config.types.pull_request.minTokens).toBe(100);
    expect(config.types.discussion.actions).toEqual(["created"]);
    expect(config.batching.maxInFlightPerSubject).toBe(2);
  });

  it("falls back to defaults only when the file is optional", () => {
    const missing = path.join(os.tmpdir(), "tollgate-missing", "config.yaml");

    expect(loadEngineConfig(missing, { env: {} }).cost.maxHourlyRate).toBe(15);
    expect(() => loadEngineConfig(missing, { required: true, env: {} })).toThrow(
      `Configuration file not found: ${missing}`
    );
  });

  it("reports YAML that does not parse", () => {
    const file = writeTemp("types: [unclosed\n");

    expect(() => loadEngineConfig(file, { env: {} })).toThrow(
      `Failed to parse ${file}; ensure valid YAML`
    );
  });

  it("treats an empty file as all defaults", () => {
    const file = writeTemp("");

    expect(loadEngineConfig(file, { env: {} }).types.issue.batchSize).toBe(5);
  });
});

describe("process configuration", () => {
  it("places state under the data directory", () => {
    expect(getDefaultConfig({ HOME: "/home/tester" })).toEqual({
      dataDir: "/home/tester/.config/tollgate",
      dbPath: "/home/tester/.config/tollgate/state.db",
      configPath: "/home/tester/.config/tollgate/config.yaml"
    });
  });

  it("reads webhook settings with defaults", () => {
    expect(getWebhookConfig({})).toEqual({ port: 8000, secret: null, path: "/webhook" });
    expect(
      getWebhookConfig({ TOLLGATE_WEBHOOK_PORT: "9100", TOLLGATE_WEBHOOK_SECRET: "test-secret" })
    ).toEqual({ port: 9100, secret: "test-secret", path: "/webhook" });
  });
});
