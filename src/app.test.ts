import os from "node:os";
import path from "node:path";
import fs from "fs-extra";
import { describe, expect, it, vi } from "vitest";
import type { DomainCheck } from "./analysis/runner";
import type { DomainResult } from "./analysis/types";
import { parseArgs, runChecker, UsageError, USAGE } from "./app";
import { ConfigError, type CheckerConfig } from "./config";
import type { HealthcheckPing } from "./healthcheck";
import type { ReportRecord } from "./storage/report-store";

const makeResult = (domain: string, isValid: boolean): DomainResult => ({
  domain,
  url: null,
  errors: isValid ? [] : ["[no_security_txt] security.txt could not be located."],
  recommendations: [],
  notifications: [],
  expiresAt: null,
  expiryOk: true,
  isValid,
  checkedAt: "2026-01-01T00:00:00.000Z",
});

const configWith = (overrides: Partial<CheckerConfig> = {}): CheckerConfig => ({
  domains: ["a.example", "b.example"],
  minExpiryDays: 30,
  healthcheckEnabled: false,
  concurrency: 1,
  ...overrides,
});

const createLog = () => ({ log: vi.fn(), warn: vi.fn(), error: vi.fn() });

const passing: DomainCheck = async (domain) => makeResult(domain, true);
const failingB: DomainCheck = async (domain) => makeResult(domain, domain !== "b.example");

describe("parseArgs", () => {
  it("should read the config path and JSON report path", () => {
    expect(parseArgs(["sites.yaml", "--json", "out/report.json"])).toEqual({
      help: false,
      configPath: "sites.yaml",
      jsonPath: "out/report.json",
    });
    expect(parseArgs(["--json=report.json"])).toEqual({ help: false, jsonPath: "report.json" });
  });

  it("should reject unknown options and extra arguments", () => {
    expect(() => parseArgs(["--verbose"])).toThrow(new UsageError("unknown option --verbose"));
    expect(() => parseArgs(["a.yaml", "b.yaml"])).toThrow("unexpected argument b.yaml");
    expect(() => parseArgs(["--json"])).toThrow("--json requires a file path");
  });
});

describe("runChecker", () => {
  it("should exit 0 when every domain passes", async () => {
    const log = createLog();

    const exitCode = await runChecker({ argv: [], env: {}, log, check: passing, load: async () => configWith() });

    expect(exitCode).toBe(0);
    const printed = log.log.mock.calls.map(([line]) => String(line));
    expect(printed[0]).toBe("Loaded 2 domain(s) from config.yaml");
    expect(printed[1]).toBe("Minimum expiry: 30 day(s) in the future\n");
    expect(printed).toContain("[1/2] checking a.example");
    expect(printed).toContain("[2/2] b.example: ✓ valid");
    expect(printed[printed.length - 1].endsWith("2/2 domains passed")).toBe(true);
  });

  it("should exit 1 when any domain fails", async () => {
    const log = createLog();

    const exitCode = await runChecker({ argv: [], env: {}, log, check: failingB, load: async () => configWith() });

    expect(exitCode).toBe(1);
    expect(log.log).toHaveBeenCalledWith("[2/2] b.example: ✗ invalid (1 error(s))");
  });

  it("should stop before checking anything when the config is invalid", async () => {
    const log = createLog();
    const check = vi.fn<DomainCheck>(passing);
    const ping = vi.fn<HealthcheckPing>();

    const exitCode = await runChecker({
      argv: ["missing.yaml"],
      env: { HEALTHCHECK_URL: "https://hc.example/ping/test-check" },
      log,
      check,
      ping,
      load: async (configPath) => {
        throw new ConfigError("file not found", configPath);
      },
    });

    expect(exitCode).toBe(1);
    expect(check).not.toHaveBeenCalled();
    expect(ping).not.toHaveBeenCalled();
    expect(log.error).toHaveBeenCalledWith("Error: invalid configuration (missing.yaml): file not found");
  });

  it("should load the config path named by SECURITY_TXT_CONFIG", async () => {
    const load = vi.fn(async () => configWith());

    await runChecker({ argv: [], env: { SECURITY_TXT_CONFIG: "ops/sites.yaml" }, log: createLog(), check: passing, load });

    expect(load).toHaveBeenCalledWith("ops/sites.yaml");
  });

  it("should never ping when the healthcheck is disabled", async () => {
    const ping = vi.fn<HealthcheckPing>();

    await runChecker({
      argv: [],
      env: { HEALTHCHECK_URL: "https://hc.example/ping/test-check" },
      log: createLog(),
      check: failingB,
      ping,
      load: async () => configWith(),
    });

    expect(ping).not.toHaveBeenCalled();
  });

  it("should keep the domain exit code when HEALTHCHECK_URL is missing", async () => {
    const log = createLog();
    const ping = vi.fn<HealthcheckPing>();

    const exitCode = await runChecker({
      argv: [],
      env: {},
      log,
      check: passing,
      ping,
      load: async () => configWith({ healthcheckEnabled: true }),
    });

    expect(exitCode).toBe(0);
    expect(ping).not.toHaveBeenCalled();
    expect(log.warn).toHaveBeenCalledTimes(1);
  });

  it("should keep the domain exit code when the ping fails", async () => {
    const ping = vi.fn<HealthcheckPing>().mockRejectedValue(new Error("timeout"));

    const exitCode = await runChecker({
      argv: [],
      env: { HEALTHCHECK_URL: "https://hc.example/ping/test-check" },
      log: createLog(),
      check: failingB,
      ping,
      load: async () => configWith({ healthcheckEnabled: true }),
    });

    expect(exitCode).toBe(1);
    expect(ping).toHaveBeenCalledWith("https://hc.example/ping/test-check", false, "1/2 domains passed");
  });

  it("should ping a failure when the run crashes", async () => {
    const ping = vi.fn<HealthcheckPing>().mockResolvedValue(undefined);
    const check: DomainCheck = async () => {
      throw new TypeError("broken check");
    };

    await expect(
      runChecker({
        argv: [],
        env: { HEALTHCHECK_URL: "https://hc.example/ping/test-check" },
        log: createLog(),
        check,
        ping,
        load: async () => configWith({ healthcheckEnabled: true }),
      }),
    ).rejects.toThrow("broken check");
    expect(ping).toHaveBeenCalledWith("https://hc.example/ping/test-check", false, "run did not complete");
  });

  it("should write the JSON report when asked", async () => {
    const workDir = await fs.mkdtemp(path.join(os.tmpdir(), "sectxt-app-"));
    const target = path.join(workDir, "reports", "run.json");

    try {
      const exitCode = await runChecker({
        argv: ["--json", target],
        env: {},
        log: createLog(),
        check: failingB,
        load: async () => configWith(),
      });

      const record: ReportRecord = await fs.readJSON(target);
      expect(exitCode).toBe(1);
      expect(record.id).toHaveLength(10);
      expect(record.summary.passed).toBe(1);
      expect(record.summary.results.map((result) => result.domain)).toEqual(["a.example", "b.example"]);
    } finally {
      await fs.remove(workDir);
    }
  });

  it("should print usage for bad arguments", async () => {
    const log = createLog();

    await expect(runChecker({ argv: ["--nope"], env: {}, log })).resolves.toBe(2);
    expect(log.error).toHaveBeenCalledWith(`Error: unknown option --nope\n\n${USAGE}`);
  });

  it("should print usage for --help", async () => {
    const log = createLog();

    await expect(runChecker({ argv: ["--help"], env: {}, log })).resolves.toBe(0);
    expect(log.log).toHaveBeenCalledWith(USAGE);
  });
});
