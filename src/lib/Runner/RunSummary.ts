/**
 * Run Summary Types
 */

export type TestStatus = 'pass' | 'fail';

/**
 * Result of one test
 */
export interface TestOutcome {
  /** 0 for the bad-endpoint probe, then 1-based test case ids */
  readonly id: number;
  /** `<path>?<query>` requested, or `bad-endpoint` */
  readonly target: string;
  readonly status: TestStatus;
  readonly reason: string;
  /** Path of the written comparison, relative to the harness directory */
  readonly resultFile?: string;
  readonly differences?: number;
}

export interface RunSummary {
  readonly total: number;
  readonly passed: number;
  readonly failed: number;
  readonly outcomes: ReadonlyArray<TestOutcome>;
}

export const summarize = (outcomes: ReadonlyArray<TestOutcome>): RunSummary => {
  const passed = outcomes.filter((outcome) => outcome.status === 'pass').length;
  return {
    total: outcomes.length,
    passed,
    failed: outcomes.length - passed,
    outcomes,
  };
};

/**
 * Process exit code for a finished run: 0 when every test passed, 1 otherwise
 */
export const exitCodeFor = (summary: RunSummary): number => (summary.failed === 0 ? 0 : 1);
