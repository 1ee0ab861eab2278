import type { CheckerConfig } from "../config";
import { checkDomain } from "./checker";
import type { BatchSummary, DomainResult, ProgressEvent } from "./types";

export type DomainCheck = (domain: string, minExpiryDays: number) => Promise<DomainResult>;

export interface BatchRunnerOptions {
  check?: DomainCheck;
  onProgress?: (event: ProgressEvent) => void;
  now?: () => Date;
}

export class BatchRunner {
  private readonly check: DomainCheck;
  private readonly now: () => Date;

  constructor(private readonly options: BatchRunnerOptions = {}) {
    this.check = options.check ?? ((domain, minExpiryDays) => checkDomain(domain, minExpiryDays));
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Checks every configured domain. Workers pull from a shared queue and each
   * result lands in the slot of its domain, so the summary keeps the configured
   * order whatever the concurrency.
   */
  async run(config: CheckerConfig): Promise<BatchSummary> {
    const startedAt = this.now().toISOString();
    const total = config.domains.length;
    const slots: Array<DomainResult | undefined> = new Array(total).fill(undefined);
    const queue = config.domains.map((domain, index) => ({ domain, index }));

    const workers = Array.from({ length: Math.min(config.concurrency, queue.length || 1) }, async () => {
      while (queue.length) {
        const next = queue.shift();
        if (!next) break;
        const position = next.index + 1;
        this.options.onProgress?.({ type: "start", domain: next.domain, position, total });
        let result: DomainResult;
        try {
          result = await this.check(next.domain, config.minExpiryDays);
        } catch (error) {
          // Stop the other workers from starting new checks.
          queue.length = 0;
          throw error;
        }
        slots[next.index] = result;
        this.options.onProgress?.({ type: "finish", domain: next.domain, position, total, result });
      }
    });

    await Promise.all(workers);

    const results = slots.filter((result): result is DomainResult => result !== undefined);
    const passed = results.filter((result) => result.isValid).length;

    return {
      total: results.length,
      passed,
      failed: results.length - passed,
      results,
      startedAt,
      finishedAt: this.now().toISOString(),
    };
  }
}
