import path from "node:path";
import fs from "fs-extra";
import { nanoid } from "nanoid";
import type { BatchSummary } from "../analysis/types";

export interface ReportRecord {
  id: string;
  createdAt: string;
  summary: BatchSummary;
}

export async function saveReport(filePath: string, summary: BatchSummary): Promise<ReportRecord> {
  const target = path.resolve(process.cwd(), filePath);
  const record: ReportRecord = {
    id: nanoid(10),
    createdAt: new Date().toISOString(),
    summary,
  };
  await fs.ensureDir(path.dirname(target));
  await fs.writeJSON(target, record, { spaces: 2 });
  return record;
}
