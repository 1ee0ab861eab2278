import { DAY_MS } from "./constants";
import type { Finding, FindingBuckets, FindingSeverity } from "./types";

export const createFindingBuckets = (): FindingBuckets => ({
  errors: [],
  recommendations: [],
  notifications: [],
});

export const pushFinding = (
  buckets: FindingBuckets,
  severity: FindingSeverity,
  code: string,
  message: string,
  line: number | null = null,
) => {
  buckets[severity].push({ code, message, line });
};

export const formatFinding = ({ code, message, line }: Finding) =>
  `[${code}] ${message}${line ? ` (line ${line})` : ""}`;

export const daysBetween = (from: Date, to: Date) => (to.getTime() - from.getTime()) / DAY_MS;
