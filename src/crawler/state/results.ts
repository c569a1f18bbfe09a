import type { FailureRecord, PageRecord } from '../../types.js';

/**
 * Page and failure records accumulated over a run. Pages are frozen on the
 * way in and each URL is held once.
 */
export class ResultLog {
  private readonly pageLog: PageRecord[] = [];
  private readonly failureLog: FailureRecord[] = [];
  private readonly pageIndex = new Map<string, number>();

  addPage(record: PageRecord): PageRecord {
    const existing = this.pageIndex.get(record.url);
    if (existing !== undefined) {
      return this.pageLog[existing];
    }

    const frozen = Object.freeze({ ...record });
    this.pageLog.push(frozen);
    this.pageIndex.set(frozen.url, this.pageLog.length - 1);
    return frozen;
  }

  addFailure(record: FailureRecord): void {
    this.failureLog.push(record);
  }

  findPage(url: string): PageRecord | undefined {
    const index = this.pageIndex.get(url);
    return index === undefined ? undefined : this.pageLog[index];
  }

  pages(): PageRecord[] {
    return [...this.pageLog];
  }

  failures(): FailureRecord[] {
    return [...this.failureLog];
  }
}
