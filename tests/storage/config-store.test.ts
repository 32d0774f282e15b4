import { describe, it, expect, beforeEach } from "vitest";
import { chmodSync, mkdirSync, mkdtempSync, readFileSync, statSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigStore, mergeConfig } from "../../src/storage/config-store.js";
import { DEFAULT_CONFIG } from "../../src/types/config.js";
import { InvalidConfigError } from "../../src/types/errors.js";

let root: string;
let configPath: string;

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), "skillrt-config-"));
  configPath = join(root, "home", "config.json");
});

function writeProjectConfig(projectRoot: string, body: string): void {
  mkdirSync(join(projectRoot, ".skillrt"), { recursive: true });
  writeFileSync(join(projectRoot, ".skillrt", "config.json"), body);
}

describe("ConfigStore loading", () => {
  it("uses the defaults when no file exists", () => {
    const store = new ConfigStore(configPath);

    expect(store.loadGlobal()).toEqual(DEFAULT_CONFIG);
  });

  it("layers project config over global config over defaults", () => {
    mkdirSync(join(root, "home"), { recursive: true });
    writeFileSync(
      configPath,
      JSON.stringify({ featureDim: 32, telemetry: { defaultRate: 0.5, rules: { router: 0.1 } } }),
    );
    const projectRoot = join(root, "project");
    writeProjectConfig(projectRoot, JSON.stringify({ telemetry: { rules: { "share_in": 1 } }, featureDim: 16 }));
    const store = new ConfigStore(configPath);

    store.loadGlobal();
    const config = store.loadProject(projectRoot);

    expect(config.featureDim).toBe(16);
    expect(config.telemetry.defaultRate).toBe(0.5);
    expect(config.telemetry.rules).toEqual({ router: 0.1, share_in: 1 });
    expect(config.decision).toEqual(DEFAULT_CONFIG.decision);
  });

  it("ignores a file that is not valid JSON", () => {
    mkdirSync(join(root, "home"), { recursive: true });
    writeFileSync(configPath, "{ featureDim: ");
    const store = new ConfigStore(configPath);

    expect(store.loadGlobal()).toEqual(DEFAULT_CONFIG);
  });

  it("ignores a file that fails validation", () => {
    mkdirSync(join(root, "home"), { recursive: true });
    writeFileSync(configPath, JSON.stringify({ telemetry: { defaultRate: 4 } }));
    const store = new ConfigStore(configPath);

    expect(store.loadGlobal().telemetry.defaultRate).toBe(1);
  });

  it("rejects unknown keys in an overlay", () => {
    mkdirSync(join(root, "home"), { recursive: true });
    writeFileSync(configPath, JSON.stringify({ featureDim: 8, colour: "blue" }));
    const store = new ConfigStore(configPath);

    expect(store.loadGlobal().featureDim).toBe(64);
  });
});

describe("ConfigStore get/set", () => {
  it("reads dotted keys", () => {
    const store = new ConfigStore(configPath);
    store.loadGlobal();

    expect(store.get("decision.sigmaGates.hc_gait_guard")).toBe(0.82);
    expect(store.get("inference.backend")).toBe("echo");
    expect(store.get("inference.backend.length.more")).toBeUndefined();
    expect(store.get("missing")).toBeUndefined();
  });

  it("persists a set value with owner-only permissions", () => {
    const store = new ConfigStore(configPath);
    store.loadGlobal();

    store.set("telemetry.rules.router", "0.25");
    store.set("inference.backend", "offset");

    expect(store.get("telemetry.rules.router")).toBe(0.25);
    expect(JSON.parse(readFileSync(configPath, "utf-8"))).toEqual({
      telemetry: { rules: { router: 0.25 } },
      inference: { backend: "offset" },
    });
    expect(statSync(configPath).mode & 0o777).toBe(0o600);

    const reloaded = new ConfigStore(configPath);
    expect(reloaded.loadGlobal().inference.backend).toBe("offset");
  });

  it("tightens permissions on a config file that already existed", () => {
    mkdirSync(join(root, "home"), { recursive: true });
    writeFileSync(configPath, "{}");
    chmodSync(configPath, 0o644);
    const store = new ConfigStore(configPath);
    store.loadGlobal();

    store.set("featureDim", "32");

    expect(statSync(configPath).mode & 0o777).toBe(0o600);
  });

  it("throws InvalidConfigError for values the schema refuses", () => {
    const store = new ConfigStore(configPath);
    store.loadGlobal();

    expect(() => store.set("telemetry.defaultRate", "2")).toThrow(InvalidConfigError);
    expect(() => store.set("inference.backend", "gpu")).toThrow(InvalidConfigError);
    expect(() => store.set("", "1")).toThrow("Invalid configuration for : key is empty");
    expect(store.get("telemetry.defaultRate")).toBe(1);
  });
});

describe("mergeConfig", () => {
  it("keeps base values the overlay leaves out", () => {
    const merged = mergeConfig(DEFAULT_CONFIG, { decision: { defaultGate: 0.7 } });

    expect(merged.decision).toEqual({ ...DEFAULT_CONFIG.decision, defaultGate: 0.7 });
    expect(merged.telemetry).toEqual(DEFAULT_CONFIG.telemetry);
  });
});
