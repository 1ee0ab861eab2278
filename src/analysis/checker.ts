import { RequestError } from "got";
import { DOMAIN_TIMEOUT_MS } from "./constants";
import { InvalidDomainError } from "./http";
import type { DomainResult, DomainValidator, Finding, ValidationReport } from "./types";
import { daysBetween, formatFinding } from "./utils";
import { validateDomain } from "./validator";

export class DomainCheckTimeoutError extends Error {
  constructor(message = "Domain check timed out") {
    super(message);
    this.name = "DomainCheckTimeoutError";
  }
}

export interface CheckOptions {
  validate?: DomainValidator;
  now?: () => Date;
  timeoutMs?: number;
}

const createDeadline = (timeoutMs: number) => {
  const controller = new AbortController();
  const timeout = setTimeout(() => {
    controller.abort(new DomainCheckTimeoutError(`check timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  const expired = new Promise<never>((_, reject) => {
    controller.signal.addEventListener("abort", () => reject(controller.signal.reason), { once: true });
  });

  return { signal: controller.signal, expired, cleanup: () => clearTimeout(timeout) };
};

const isTransportFailure = (error: unknown): error is Error =>
  error instanceof RequestError || error instanceof DomainCheckTimeoutError;

const freezeResult = (result: DomainResult): DomainResult =>
  Object.freeze({
    ...result,
    errors: Object.freeze([...result.errors]),
    recommendations: Object.freeze([...result.recommendations]),
    notifications: Object.freeze([...result.notifications]),
  });

/**
 * Checks one domain and folds the validator's findings and the minimum expiry
 * rule into a `DomainResult`. Unreachable domains become a single
 * `fetch_failed` error and malformed hosts an `invalid_domain` error; anything
 * else the validator throws propagates.
 */
export async function checkDomain(
  domain: string,
  minExpiryDays: number,
  { validate = validateDomain, now = () => new Date(), timeoutMs = DOMAIN_TIMEOUT_MS }: CheckOptions = {},
): Promise<DomainResult> {
  const checkedAt = now();
  const deadline = createDeadline(timeoutMs);

  let report: ValidationReport;
  try {
    report = await Promise.race([validate(domain, { signal: deadline.signal, now: checkedAt }), deadline.expired]);
  } catch (error) {
    let finding: Finding;
    if (error instanceof InvalidDomainError) {
      finding = { code: "invalid_domain", message: error.message, line: null };
    } else if (isTransportFailure(error)) {
      finding = { code: "fetch_failed", message: `fetch failed: ${error.message}`, line: null };
    } else {
      throw error;
    }
    return freezeResult({
      domain,
      url: null,
      errors: [formatFinding(finding)],
      recommendations: [],
      notifications: [],
      expiresAt: null,
      expiryOk: false,
      isValid: false,
      checkedAt: checkedAt.toISOString(),
    });
  } finally {
    deadline.cleanup();
  }

  const errors = report.errors.map(formatFinding);
  const expiryOk = report.expiresAt === null || daysBetween(checkedAt, report.expiresAt) >= minExpiryDays;
  if (!expiryOk) {
    errors.push(
      formatFinding({
        code: "expiry_too_soon",
        message: `Expires field is less than ${minExpiryDays} days in the future`,
        line: null,
      }),
    );
  }

  return freezeResult({
    domain,
    url: report.url,
    errors,
    recommendations: report.recommendations.map(formatFinding),
    notifications: report.notifications.map(formatFinding),
    expiresAt: report.expiresAt ? report.expiresAt.toISOString() : null,
    expiryOk,
    isValid: errors.length === 0 && expiryOk,
    checkedAt: checkedAt.toISOString(),
  });
}
