import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import {
  defaultEngineConfig,
  loadEngineConfig,
  resolveEngineConfig,
} from "../src/config/engine-config";

const tempProject = (): string =>
  fs.mkdtempSync(path.join(os.tmpdir(), "triage-config-"));

const writeConfig = (cwd: string, name: string, content: string): void => {
  const file = path.join(cwd, ".triage", name);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content, "utf8");
};

describe("resolveEngineConfig", () => {
  it("returns the defaults without overrides", () => {
    expect(resolveEngineConfig()).toEqual(defaultEngineConfig);
    expect(defaultEngineConfig.maxCollectionAttempts).toBe(5);
    expect(defaultEngineConfig.diagnosisConfidenceThreshold).toBe(0.6);
  });

  it("applies valid overrides", () => {
    const config = resolveEngineConfig({
      maxCycles: 10,
      approvalPolicy: "never",
      approvalPatterns: ["terminate"],
    });

    expect(config.maxCycles).toBe(10);
    expect(config.approvalPolicy).toBe("never");
    expect(config.approvalPatterns).toEqual(["terminate"]);
    expect(config.adapterConcurrency).toBe(4);
  });

  it("throws on out-of-range values", () => {
    expect(() => resolveEngineConfig({ maxCycles: 0 })).toThrow(
      "maxCycles must be an integer between 1 and 10000, got 0",
    );
    expect(() =>
      resolveEngineConfig({ diagnosisConfidenceThreshold: 1.5 }),
    ).toThrow(
      "diagnosisConfidenceThreshold must be a number between 0 and 1, got 1.5",
    );
    expect(() => resolveEngineConfig({ adapterConcurrency: 2.5 })).toThrow(
      RangeError,
    );
  });
});

describe("loadEngineConfig", () => {
  it("returns defaults when no config file exists", async () => {
    await expect(loadEngineConfig(tempProject())).resolves.toEqual(
      defaultEngineConfig,
    );
  });

  it("reads .triage/engine.json and drops values that do not fit", async () => {
    const cwd = tempProject();
    writeConfig(
      cwd,
      "engine.json",
      JSON.stringify({
        maxCycles: 12,
        approvalPolicy: "always",
        adapterConcurrency: -1,
        logLevel: "loud",
        approvalPatterns: ["shutdown", 3],
      }),
    );

    const config = await loadEngineConfig(cwd);
    expect(config.maxCycles).toBe(12);
    expect(config.approvalPolicy).toBe("always");
    expect(config.adapterConcurrency).toBe(4);
    expect(config.logLevel).toBe("info");
    expect(config.approvalPatterns).toEqual(defaultEngineConfig.approvalPatterns);
  });

  it("prefers .triage/engine.ts when present", async () => {
    const cwd = tempProject();
    writeConfig(cwd, "engine.ts", "export default { maxCollectionAttempts: 3, logLevel: \"warn\" };\n");
    writeConfig(cwd, "engine.json", JSON.stringify({ maxCollectionAttempts: 7 }));

    const config = await loadEngineConfig(cwd);
    expect(config.maxCollectionAttempts).toBe(3);
    expect(config.logLevel).toBe("warn");
  });

  it("reports a config module that fails to load", async () => {
    const cwd = tempProject();
    writeConfig(cwd, "engine.ts", "throw new Error(\"bad config\");\n");

    await expect(loadEngineConfig(cwd)).rejects.toThrow(/Failed to load .*engine\.ts/);
  });
});
