export interface TestCase {
  name: string;
  passed: boolean;
  /** Seconds. */
  duration?: number;
  failureMessage?: string;
}

export interface TestRunResult {
  totalPassed: number;
  failedNames: string[];
  cases: TestCase[];
}

export interface TestRunRecord {
  date: Date;
  result: TestRunResult;
  rawOutput: string;
  succeeded: boolean;
}
