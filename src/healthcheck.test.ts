import { describe, expect, it, vi } from "vitest";
import type { BatchSummary } from "./analysis/types";
import { healthcheckTarget, notifyHealthcheck, type HealthcheckPing } from "./healthcheck";

const HEALTHCHECK_URL = "https://hc.example/ping/test-check";

const summaryOf = (passed: number, failed: number): BatchSummary => ({
  total: passed + failed,
  passed,
  failed,
  results: [],
  startedAt: "2026-01-01T00:00:00.000Z",
  finishedAt: "2026-01-01T00:00:01.000Z",
});

const createLog = () => ({ log: vi.fn(), warn: vi.fn(), error: vi.fn() });

describe("notifyHealthcheck", () => {
  it("should not ping when the healthcheck is disabled", async () => {
    const ping = vi.fn<HealthcheckPing>();

    const sent = await notifyHealthcheck(summaryOf(0, 2), { healthcheckEnabled: false }, {
      env: { HEALTHCHECK_URL },
      ping,
      log: createLog(),
    });

    expect(sent).toBe(false);
    expect(ping).not.toHaveBeenCalled();
  });

  it("should warn and skip when HEALTHCHECK_URL is unset", async () => {
    const ping = vi.fn<HealthcheckPing>();
    const log = createLog();

    const sent = await notifyHealthcheck(summaryOf(1, 0), { healthcheckEnabled: true }, { env: {}, ping, log });

    expect(sent).toBe(false);
    expect(ping).not.toHaveBeenCalled();
    expect(log.warn).toHaveBeenCalledWith(
      "Warning: healthcheck is enabled but HEALTHCHECK_URL is not set; skipping ping.",
    );
  });

  it("should report success with the summary counts", async () => {
    const ping = vi.fn<HealthcheckPing>().mockResolvedValue(undefined);

    const sent = await notifyHealthcheck(summaryOf(2, 0), { healthcheckEnabled: true }, {
      env: { HEALTHCHECK_URL },
      ping,
      log: createLog(),
    });

    expect(sent).toBe(true);
    expect(ping).toHaveBeenCalledWith(HEALTHCHECK_URL, true, "2/2 domains passed");
  });

  it("should report failure when any domain failed", async () => {
    const ping = vi.fn<HealthcheckPing>().mockResolvedValue(undefined);

    await notifyHealthcheck(summaryOf(1, 2), { healthcheckEnabled: true }, {
      env: { HEALTHCHECK_URL },
      ping,
      log: createLog(),
    });

    expect(ping).toHaveBeenCalledWith(HEALTHCHECK_URL, false, "1/3 domains passed");
  });

  it("should report failure when the run did not complete", async () => {
    const ping = vi.fn<HealthcheckPing>().mockResolvedValue(undefined);

    await notifyHealthcheck(null, { healthcheckEnabled: true }, { env: { HEALTHCHECK_URL }, ping, log: createLog() });

    expect(ping).toHaveBeenCalledWith(HEALTHCHECK_URL, false, "run did not complete");
  });

  it("should only warn when the ping fails", async () => {
    const ping = vi.fn<HealthcheckPing>().mockRejectedValue(new Error("connect ECONNREFUSED"));
    const log = createLog();

    const sent = await notifyHealthcheck(summaryOf(1, 0), { healthcheckEnabled: true }, {
      env: { HEALTHCHECK_URL },
      ping,
      log,
    });

    expect(sent).toBe(false);
    expect(log.warn).toHaveBeenCalledWith("Warning: healthcheck ping failed: connect ECONNREFUSED");
  });
});

describe("healthcheckTarget", () => {
  it("should use the URL itself for success", () => {
    expect(healthcheckTarget(HEALTHCHECK_URL, true)).toBe(HEALTHCHECK_URL);
  });

  it("should append /fail for failures", () => {
    expect(healthcheckTarget(HEALTHCHECK_URL, false)).toBe(`${HEALTHCHECK_URL}/fail`);
    expect(healthcheckTarget(`${HEALTHCHECK_URL}/`, false)).toBe(`${HEALTHCHECK_URL}/fail`);
  });
});
