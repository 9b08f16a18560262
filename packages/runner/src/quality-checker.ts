import {
  QualityVerdict,
  SubTaskStatus,
  type ExecutionPlan,
  type QualityCheckOutcome,
  type QualityReport,
} from '@taskflow/workflow-spec';
import { InvalidConfigurationError } from './errors';

/**
 * 品質チェック（差し替え可能）
 */
export interface QualityCheck {
  readonly name: string;

  /** チェックが fail / warning の場合の推奨アクション */
  readonly recommendedAction?: string;

  run(plan: ExecutionPlan, now: Date): QualityCheckOutcome;
}

function percent(rate: number): string {
  return `${Math.round(rate * 100)}%`;
}

/**
 * 完了率（任意タスクを除く）
 */
export class CompletionRateCheck implements QualityCheck {
  readonly name = 'completion-rate';
  readonly recommendedAction = '未完了のタスクを確認して再実行を検討してください';

  constructor(private readonly minRate = 0.8) {}

  run(plan: ExecutionPlan): QualityCheckOutcome {
    const required = plan.subtasks.filter((st) => !st.config.is_optional);
    if (required.length === 0) {
      return { name: this.name, verdict: QualityVerdict.PASS, score: 1, message: 'タスクなし' };
    }

    const rate = required.filter((st) => st.status === SubTaskStatus.COMPLETED).length / required.length;

    if (rate >= this.minRate) {
      return { name: this.name, verdict: QualityVerdict.PASS, score: rate, message: `${percent(rate)}完了` };
    }
    if (rate >= this.minRate * 0.8) {
      return { name: this.name, verdict: QualityVerdict.WARNING, score: rate, message: `完了率が低め: ${percent(rate)}` };
    }
    return {
      name: this.name,
      verdict: QualityVerdict.FAIL,
      score: rate,
      message: `完了率が基準未満: ${percent(rate)} (基準: ${percent(this.minRate)})`,
    };
  }
}

/**
 * エラー率
 */
export class ErrorRateCheck implements QualityCheck {
  readonly name = 'error-rate';
  readonly recommendedAction = 'エラーの原因を確認してください';

  constructor(private readonly maxRate = 0.1) {}

  run(plan: ExecutionPlan): QualityCheckOutcome {
    if (plan.subtasks.length === 0) {
      return { name: this.name, verdict: QualityVerdict.PASS, score: 1, message: 'タスクなし' };
    }

    const rate = plan.subtasks.filter((st) => st.status === SubTaskStatus.FAILED).length / plan.subtasks.length;
    const score = 1 - rate;

    if (rate <= this.maxRate) {
      return { name: this.name, verdict: QualityVerdict.PASS, score, message: `エラー率: ${percent(rate)}` };
    }
    if (rate <= this.maxRate * 2) {
      return { name: this.name, verdict: QualityVerdict.WARNING, score, message: `エラー率がやや高め: ${percent(rate)}` };
    }
    return {
      name: this.name,
      verdict: QualityVerdict.FAIL,
      score,
      message: `エラー率が基準超過: ${percent(rate)} (基準: ${percent(this.maxRate)})`,
    };
  }
}

/**
 * 実行時間（タイムアウト合計との比）
 */
export class ExecutionTimeCheck implements QualityCheck {
  readonly name = 'execution-time';
  readonly recommendedAction = 'タイムアウト設定や処理内容を見直してください';

  run(plan: ExecutionPlan, now: Date): QualityCheckOutcome {
    if (!plan.started_at) {
      return { name: this.name, verdict: QualityVerdict.SKIPPED, score: 1, message: '未開始' };
    }

    const budgetMs = plan.subtasks.reduce((sum, st) => sum + st.config.timeout_seconds * 1000, 0);
    if (budgetMs === 0) {
      return { name: this.name, verdict: QualityVerdict.PASS, score: 1, message: '計測不要' };
    }

    const elapsedMs = (plan.completed_at ?? now).getTime() - plan.started_at.getTime();
    const seconds = (elapsedMs / 1000).toFixed(1);
    const ratio = elapsedMs / budgetMs;

    if (ratio <= 1) {
      return { name: this.name, verdict: QualityVerdict.PASS, score: 1, message: `想定内: ${seconds}秒` };
    }
    if (ratio <= 1.5) {
      return { name: this.name, verdict: QualityVerdict.WARNING, score: 1 / ratio, message: `やや遅延: ${seconds}秒` };
    }
    return { name: this.name, verdict: QualityVerdict.WARNING, score: 0.5, message: `大幅遅延: ${seconds}秒` };
  }
}

/**
 * データ整合性（完了タスクの結果と時刻、実行中の残留）
 */
export class DataIntegrityCheck implements QualityCheck {
  readonly name = 'data-integrity';
  readonly recommendedAction = '実行結果のデータを確認してください';

  run(plan: ExecutionPlan): QualityCheckOutcome {
    const inspected = plan.subtasks.filter(
      (st) => st.status === SubTaskStatus.COMPLETED || st.status === SubTaskStatus.IN_PROGRESS
    );
    if (inspected.length === 0) {
      return { name: this.name, verdict: QualityVerdict.PASS, score: 1, message: '検証対象なし' };
    }

    const valid = inspected.filter((st) => {
      if (st.status !== SubTaskStatus.COMPLETED || st.result === null || !st.completed_at) {
        return false;
      }
      return !st.started_at || st.completed_at.getTime() >= st.started_at.getTime();
    }).length;

    if (valid === inspected.length) {
      return { name: this.name, verdict: QualityVerdict.PASS, score: 1, message: 'データ整合性OK' };
    }
    return {
      name: this.name,
      verdict: QualityVerdict.FAIL,
      score: valid / inspected.length,
      message: `不整合なタスク: ${inspected.length - valid}件`,
    };
  }
}

export function createDefaultQualityChecks(): QualityCheck[] {
  return [new CompletionRateCheck(), new ErrorRateCheck(), new ExecutionTimeCheck(), new DataIntegrityCheck()];
}

export interface QualityCheckerOptions {
  checks?: QualityCheck[];
  now?: () => Date;
}

/**
 * 品質チェッカー
 */
export class QualityChecker {
  private readonly checks: QualityCheck[];
  private readonly now: () => Date;

  constructor(options: QualityCheckerOptions = {}) {
    this.checks = options.checks ?? createDefaultQualityChecks();
    if (this.checks.length === 0) {
      throw new InvalidConfigurationError('QualityChecker requires at least one check');
    }
    this.now = options.now ?? (() => new Date());
  }

  /**
   * 計画の実行結果を評価
   */
  checkPlan(plan: ExecutionPlan): QualityReport {
    const now = this.now();
    const outcomes = this.checks.map((check) => ({ check, outcome: check.run(plan, now) }));

    const issues: string[] = [];
    const warnings: string[] = [];
    const recommendedActions: string[] = [];

    for (const { check, outcome } of outcomes) {
      if (outcome.verdict === QualityVerdict.FAIL) {
        issues.push(outcome.message);
      } else if (outcome.verdict === QualityVerdict.WARNING) {
        warnings.push(outcome.message);
      } else {
        continue;
      }
      if (check.recommendedAction) {
        recommendedActions.push(check.recommendedAction);
      }
    }

    const scored = outcomes.filter(({ outcome }) => outcome.verdict !== QualityVerdict.SKIPPED);
    const score =
      scored.length === 0 ? 1 : scored.reduce((sum, { outcome }) => sum + outcome.score, 0) / scored.length;

    let verdict: QualityVerdict = QualityVerdict.PASS;
    if (issues.length > 0) {
      verdict = QualityVerdict.FAIL;
    } else if (warnings.length > 0) {
      verdict = QualityVerdict.WARNING;
    }

    const meetsRequiredScore = score >= plan.required_quality_score;
    if (!meetsRequiredScore) {
      warnings.push(`品質スコアが基準未満: ${percent(score)} (基準: ${percent(plan.required_quality_score)})`);
    }

    const report: QualityReport = {
      plan_id: plan.id,
      verdict,
      score,
      checks: outcomes.map(({ outcome }) => Object.freeze(outcome)),
      issues,
      warnings,
      recommended_actions: recommendedActions,
      meets_required_score: meetsRequiredScore,
      checked_at: now,
    };

    Object.freeze(report.checks);
    Object.freeze(report.issues);
    Object.freeze(report.warnings);
    Object.freeze(report.recommended_actions);
    return Object.freeze(report);
  }
}
