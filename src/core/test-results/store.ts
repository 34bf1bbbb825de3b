import type { TestRunRecord, TestRunResult } from "../types.js";

export interface LatestRunStore<T> {
  latest(): T | null;
  record(value: T): void;
  clear(): void;
  /** Called with the new value (or null after `clear`) on every write. */
  subscribe(listener: (value: T | null) => void): () => void;
}

/** Single caller-owned slot; each run replaces the previous one wholesale. */
export function createLatestRunStore<T>(): LatestRunStore<T> {
  let current: T | null = null;
  const listeners = new Set<(value: T | null) => void>();

  const publish = (): void => {
    for (const listener of [...listeners]) listener(current);
  };

  return {
    latest() {
      return current;
    },
    record(value) {
      current = value;
      publish();
    },
    clear() {
      current = null;
      publish();
    },
    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    }
  };
}

export function createTestRunRecord(
  result: TestRunResult,
  rawOutput: string,
  succeeded: boolean,
  date: Date = new Date()
): TestRunRecord {
  return { date, result, rawOutput, succeeded };
}

export function passedCount(record: TestRunRecord): number {
  return record.result.cases.filter((testCase) => testCase.passed).length;
}

export function failedCount(record: TestRunRecord): number {
  return record.result.cases.filter((testCase) => !testCase.passed).length;
}
