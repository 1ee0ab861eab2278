import { httpClient } from "./analysis/http";
import type { BatchSummary } from "./analysis/types";
import type { CheckerConfig } from "./config";
import { renderSummaryLine } from "./report";
import type { Logger } from "./types";

const HEALTHCHECK_TIMEOUT_MS = 10_000;

export class HealthcheckError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "HealthcheckError";
  }
}

export type HealthcheckPing = (url: string, success: boolean, body: string) => Promise<void>;

export const healthcheckTarget = (url: string, success: boolean) =>
  success ? url : `${url.replace(/\/+$/, "")}/fail`;

export const pingHealthcheck: HealthcheckPing = async (url, success, body) => {
  const response = await httpClient.post(healthcheckTarget(url, success), {
    body,
    headers: { "Content-Type": "text/plain; charset=utf-8" },
    throwHttpErrors: false,
    timeout: { request: HEALTHCHECK_TIMEOUT_MS },
  });
  if (response.statusCode < 200 || response.statusCode >= 300) {
    throw new HealthcheckError(`healthcheck responded with status ${response.statusCode}`);
  }
};

export interface NotifyOptions {
  env?: NodeJS.ProcessEnv;
  ping?: HealthcheckPing;
  log?: Logger;
}

/**
 * Reports the outcome of a run to HEALTHCHECK_URL. A null summary means the run
 * stopped before every domain was checked and is reported as a failure.
 * Never throws; resolves to whether the ping was delivered.
 */
export async function notifyHealthcheck(
  summary: BatchSummary | null,
  config: Pick<CheckerConfig, "healthcheckEnabled">,
  { env = process.env, ping = pingHealthcheck, log = console }: NotifyOptions = {},
): Promise<boolean> {
  if (!config.healthcheckEnabled) {
    return false;
  }

  const url = env.HEALTHCHECK_URL?.trim();
  if (!url) {
    log.warn("Warning: healthcheck is enabled but HEALTHCHECK_URL is not set; skipping ping.");
    return false;
  }

  const success = summary !== null && summary.failed === 0;
  const body = summary ? renderSummaryLine(summary) : "run did not complete";

  try {
    await ping(url, success, body);
    log.log(`Healthcheck sent (${success ? "success" : "failure"}).`);
    return true;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    log.warn(`Warning: healthcheck ping failed: ${reason}`);
    return false;
  }
}
