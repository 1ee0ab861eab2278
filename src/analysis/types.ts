export type FindingSeverity = "errors" | "recommendations" | "notifications";

export interface Finding {
  code: string;
  message: string;
  line: number | null;
}

export interface FindingBuckets {
  errors: Finding[];
  recommendations: Finding[];
  notifications: Finding[];
}

export interface SecurityTxtDocument {
  domain: string;
  requestedUrl: string;
  finalUrl: string;
  statusCode: number;
  contentType: string | null;
  body: string;
  invalidCert: boolean;
  legacyLocation: boolean;
}

export interface ValidationReport extends FindingBuckets {
  url: string | null;
  expiresAt: Date | null;
}

export interface ValidateOptions {
  signal?: AbortSignal;
  now?: Date;
}

/**
 * Validates the security.txt published by a single domain. Missing or invalid
 * files come back as findings; only transport failures reject.
 */
export type DomainValidator = (domain: string, options?: ValidateOptions) => Promise<ValidationReport>;

export interface DomainResult {
  readonly domain: string;
  readonly url: string | null;
  readonly errors: readonly string[];
  readonly recommendations: readonly string[];
  readonly notifications: readonly string[];
  readonly expiresAt: string | null;
  readonly expiryOk: boolean;
  readonly isValid: boolean;
  readonly checkedAt: string;
}

export interface BatchSummary {
  total: number;
  passed: number;
  failed: number;
  results: DomainResult[];
  startedAt: string;
  finishedAt: string;
}

export type ProgressEvent =
  | { type: "start"; domain: string; position: number; total: number }
  | { type: "finish"; domain: string; position: number; total: number; result: DomainResult };
