import { describe, it, expect } from "vitest";
import { ConfigError } from "../../src/shared/errors.js";
import { configFromEnv, loadBatchConfig, parseEngine } from "../../src/shared/run_config.js";

const paths = { dataPath: "data.csv", outDir: "out", templatesDir: "templates" };

describe("parseEngine", () => {
  it("normalizes aliases", () => {
    expect(parseEngine("LibreOffice")).toBe("libreoffice");
    expect(parseEngine("soffice")).toBe("libreoffice");
    expect(parseEngine("ms-office")).toBe("msoffice");
    expect(parseEngine(undefined, "office")).toBe("msoffice");
    expect(parseEngine("whatever")).toBe("auto");
    expect(parseEngine()).toBe("auto");
  });

  it("prefers the CLI value over the environment", () => {
    expect(parseEngine("lo", "msoffice")).toBe("libreoffice");
  });
});

describe("loadBatchConfig", () => {
  it("fills schema defaults", () => {
    const config = loadBatchConfig(paths, {});
    expect(config).toMatchObject({
      filenamePattern: "{index:04d}.pdf",
      engine: "auto",
      strict: false,
      dryRun: false,
      concurrency: 1,
      renderTimeoutMs: 120_000,
      exportRetries: 2,
      fieldMatching: "insensitive",
      scanHeadersFooters: true,
      scanMasters: true,
      scanNotes: true,
    });
  });

  it("takes TOKENFILL_* variables below CLI flags", () => {
    const env = {
      TOKENFILL_ENGINE: "lo",
      TOKENFILL_SOFFICE_BIN: "/opt/lo/soffice",
      TOKENFILL_CONCURRENCY: "4",
      TOKENFILL_RENDER_TIMEOUT_MS: "5000",
      TOKENFILL_FIELD_MATCHING: "Sensitive",
    };
    const config = loadBatchConfig({ ...paths, concurrency: 2 }, env);
    expect(config).toMatchObject({
      engine: "libreoffice",
      sofficeBin: "/opt/lo/soffice",
      concurrency: 2,
      renderTimeoutMs: 5000,
      fieldMatching: "sensitive",
    });
  });

  it("rejects malformed environment values", () => {
    expect(() => configFromEnv({ TOKENFILL_CONCURRENCY: "many" })).toThrow(
      'TOKENFILL_CONCURRENCY must be an integer, got "many"',
    );
    expect(() => configFromEnv({ TOKENFILL_FIELD_MATCHING: "fuzzy" })).toThrow(ConfigError);
  });

  it("reports schema violations with their path", () => {
    expect(() => loadBatchConfig({ ...paths, rowFrom: 5, rowTo: 2 }, {})).toThrow(
      "Invalid configuration: rowFrom: --from must not be greater than --to",
    );
    expect(() => loadBatchConfig({ ...paths, concurrency: 0 }, {})).toThrow(/^Invalid configuration: concurrency: /);
  });
});
