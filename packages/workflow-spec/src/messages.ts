import type { EscalationRequest, EscalationSeverity, ProgressReport } from './types';

/**
 * 重要度マーカー
 */
export const SEVERITY_MARKERS: Record<EscalationSeverity, string> = {
  info: 'ℹ️',
  confirmation: '🤔',
  decision: '⚠️',
  urgent: '🚨',
};

const PROGRESS_BAR_SLOTS = 10;

/**
 * 長い文字列を先頭だけ残して省略
 */
export function previewText(text: string, length: number): string {
  return text.length > length ? `${text.slice(0, length)}...` : text;
}

/**
 * 10スロットのプログレスバー
 */
export function renderProgressBar(percentage: number): string {
  const clamped = Math.min(100, Math.max(0, percentage));
  const filled = Math.floor(clamped / PROGRESS_BAR_SLOTS);
  return '▓'.repeat(filled) + '░'.repeat(PROGRESS_BAR_SLOTS - filled);
}

/**
 * 進捗レポートをユーザー向けテキストに変換
 */
export function renderProgressReport(report: ProgressReport): string {
  const lines = [
    '📊 進捗状況',
    '',
    report.plan_name,
    `${renderProgressBar(report.percentage)} ${report.percentage}%`,
    '',
    report.current_activity,
  ];

  if (report.issues.length > 0) {
    lines.push('', `⚠️ 注意: ${report.issues.join(', ')}`);
  }

  return lines.join('\n');
}

/**
 * エスカレーションをユーザー向けテキストに変換
 *
 * マーカー + タイトル → 説明 → 経緯 → 推奨 → 番号付き選択肢 → 回答依頼
 */
export function renderEscalationMessage(request: EscalationRequest): string {
  const lines = [`${SEVERITY_MARKERS[request.severity]} ${request.title}`, '', request.description];

  if (request.context) {
    lines.push('', '📋 経緯:', request.context);
  }

  if (request.recommendation) {
    const recommended = request.options.find((opt) => opt.id === request.recommendation);
    lines.push('', `💡 推奨: ${recommended?.label ?? request.recommendation}`);
    if (request.recommendation_reason) {
      lines.push(`  理由: ${request.recommendation_reason}`);
    }
  }

  if (request.options.length > 0) {
    lines.push('', '選択肢:');
    request.options.forEach((opt, index) => {
      lines.push(`${index + 1}. ${opt.label}`);
      if (opt.description) {
        lines.push(`   ${opt.description}`);
      }
    });
    lines.push('', '番号で教えてください。');
  } else {
    lines.push('', '内容を確認してください。');
  }

  return lines.join('\n');
}
