import type { CategoryName, Issue, Severity } from '../types';

const STARTING_SCORE = 100;

/**
 * Per-run accumulator of issues and score deductions for one analyzer.
 * The running score is floor-clamped at 0 after every deduction.
 *
 * Issue ids are expected to be unique within a run but are not checked.
 */
export class IssueLedger {
  private score = STARTING_SCORE;
  private readonly recorded: Issue[] = [];

  constructor(readonly category: CategoryName) {}

  record(
    id: string,
    severity: Severity,
    title: string,
    description: string,
    recommendation: string,
    impact: string,
    points: number
  ): void {
    this.deduct(points);
    this.recorded.push({ id, category: this.category, severity, title, description, recommendation, impact });
  }

  /** Deducts points without emitting an issue. */
  deduct(points: number): void {
    this.score = Math.max(0, this.score - points);
  }

  finalScore(): number {
    return this.score;
  }

  issues(): Issue[] {
    return [...this.recorded];
  }
}

/**
 * Ledger whose deductions are also attributed to exactly one named bucket.
 * Buckets start at their own budget and clamp at 0 independently of the overall score.
 */
export class BucketedIssueLedger<K extends string> extends IssueLedger {
  private readonly buckets: Record<K, number>;

  constructor(category: CategoryName, budgets: Readonly<Record<K, number>>) {
    super(category);
    this.buckets = { ...budgets };
  }

  recordIn(
    bucket: K,
    id: string,
    severity: Severity,
    title: string,
    description: string,
    recommendation: string,
    impact: string,
    points: number
  ): void {
    this.record(id, severity, title, description, recommendation, impact, points);
    this.buckets[bucket] = Math.max(0, this.buckets[bucket] - points);
  }

  subScores(): Record<K, number> {
    return { ...this.buckets };
  }
}
