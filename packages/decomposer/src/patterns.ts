/**
 * 分解パターン定義
 *
 * トリガーキーワード + 条件 + サブタスクテンプレート（名前で依存を指定）
 */

import { v4 as uuidv4 } from 'uuid';
import {
  createSubTask,
  RecoveryStrategy,
  type SubTask,
} from '@taskflow/workflow-spec';
import type { ExtractedParams } from './parameter-extractor';

/**
 * サブタスクテンプレート
 */
export interface SubTaskTemplate {
  name: string;
  capability: string;
  description: string;

  /** 依存するテンプレート名 */
  depends_on?: string[];

  is_optional?: boolean;
  recovery_strategy?: RecoveryStrategy;

  /** サブタスクのパラメータ名 → 抽出パラメータ名 */
  param_mappings?: Record<string, string>;
}

/**
 * パターン適用条件
 */
export type PatternCondition = (request: string, params: ExtractedParams) => boolean;

/**
 * 分解パターン
 */
export interface DecompositionPattern {
  name: string;
  triggers: string[];
  templates: SubTaskTemplate[];
  priority: number;
  conditions?: PatternCondition[];

  /** 必要なトリガー一致数（デフォルト 2） */
  min_trigger_hits?: number;
}

const DEFAULT_MIN_TRIGGER_HITS = 2;

const BULK_WORDS = ['一括', 'まとめて', '全部', '全て', 'bulk', 'all of'];

/**
 * パターンがリクエストに一致するか
 */
export function matchesPattern(
  pattern: DecompositionPattern,
  request: string,
  params: ExtractedParams
): boolean {
  const normalized = request.toLowerCase();
  const hits = pattern.triggers.filter((t) => normalized.includes(t.toLowerCase())).length;
  if (hits < (pattern.min_trigger_hits ?? DEFAULT_MIN_TRIGGER_HITS)) {
    return false;
  }
  return (pattern.conditions ?? []).every((condition) => condition(request, params));
}

/**
 * テンプレートからサブタスクを生成（依存はテンプレート名からIDへ解決）
 */
export function instantiatePattern(pattern: DecompositionPattern, params: ExtractedParams): SubTask[] {
  const idByName = new Map<string, string>();
  for (const template of pattern.templates) {
    idByName.set(template.name, uuidv4());
  }

  return pattern.templates.map((template) => {
    const mapped: Record<string, unknown> = {};
    for (const [target, source] of Object.entries(template.param_mappings ?? {})) {
      if (params[source] !== undefined) {
        mapped[target] = params[source];
      }
    }

    const dependsOn = (template.depends_on ?? []).flatMap((name) => {
      const id = idByName.get(name);
      return id ? [id] : [];
    });

    return createSubTask({
      id: idByName.get(template.name),
      name: template.name,
      description: template.description,
      capability: template.capability,
      params: mapped,
      depends_on: dependsOn,
      config: {
        is_optional: template.is_optional ?? false,
        recovery_strategy:
          template.recovery_strategy ??
          (template.is_optional ? RecoveryStrategy.SKIP : RecoveryStrategy.RETRY),
      },
    });
  });
}

// =============================================================================
// Built-in patterns
// =============================================================================

export const TASK_PATTERNS: DecompositionPattern[] = [
  {
    name: 'task_create_and_assign',
    triggers: ['タスク', '作成', '作って', '割り当て', 'アサイン', '担当'],
    templates: [
      {
        name: 'タスク作成',
        capability: 'chatwork_task_create',
        description: '新しいタスクを作成',
        param_mappings: { body: 'task_body', limit_time: 'datetime' },
      },
      {
        name: '担当者設定',
        capability: 'chatwork_task_assign',
        description: 'タスクに担当者を設定',
        depends_on: ['タスク作成'],
        param_mappings: { assignee_name: 'assignee' },
        is_optional: true,
      },
    ],
    priority: 10,
  },
  {
    name: 'bulk_task_completion',
    triggers: ['タスク', '完了', '一括', 'まとめて', '全部'],
    conditions: [(request) => BULK_WORDS.some((w) => request.toLowerCase().includes(w))],
    templates: [
      {
        name: 'タスク検索',
        capability: 'chatwork_task_search',
        description: '対象タスクを検索',
      },
      {
        name: '一括完了',
        capability: 'chatwork_task_complete_bulk',
        description: 'タスクを一括完了',
        depends_on: ['タスク検索'],
      },
      {
        name: '完了報告',
        capability: 'generate_completion_summary',
        description: '完了報告を生成',
        depends_on: ['一括完了'],
        is_optional: true,
      },
    ],
    priority: 8,
  },
];

export const MEETING_PATTERNS: DecompositionPattern[] = [
  {
    name: 'meeting_room_reservation',
    triggers: ['会議室', '予約', 'ミーティングルーム', '招待', 'カレンダー'],
    templates: [
      {
        name: '空き確認',
        capability: 'check_room_availability',
        description: '会議室の空き状況を確認',
        param_mappings: { room_name: 'room', datetime: 'datetime', time: 'time' },
      },
      {
        name: '予約実行',
        capability: 'reserve_meeting_room',
        description: '会議室を予約',
        depends_on: ['空き確認'],
        param_mappings: { room_name: 'room', datetime: 'datetime', time: 'time' },
        recovery_strategy: RecoveryStrategy.ESCALATE,
      },
      {
        name: '招待送信',
        capability: 'send_calendar_invite',
        description: '参加者にカレンダー招待を送信',
        depends_on: ['予約実行'],
        param_mappings: { attendees: 'participants' },
        is_optional: true,
      },
    ],
    priority: 10,
  },
];

export const ANNOUNCEMENT_PATTERNS: DecompositionPattern[] = [
  {
    name: 'multi_room_announcement',
    triggers: ['アナウンス', 'お知らせ', '周知', '複数', 'ルーム', '全員'],
    templates: [
      {
        name: '対象ルーム特定',
        capability: 'identify_target_rooms',
        description: 'アナウンス対象のルームを特定',
      },
      {
        name: 'アナウンス送信',
        capability: 'announcement_create',
        description: 'アナウンスを送信',
        depends_on: ['対象ルーム特定'],
        param_mappings: { message: 'announcement_text' },
      },
      {
        name: '送信確認',
        capability: 'verify_announcement_delivery',
        description: '送信結果を確認',
        depends_on: ['アナウンス送信'],
        is_optional: true,
      },
    ],
    priority: 8,
  },
];

export const KNOWLEDGE_PATTERNS: DecompositionPattern[] = [
  {
    name: 'knowledge_search_and_summarize',
    triggers: ['調べて', 'まとめて', '要約', 'レポート', '報告'],
    templates: [
      {
        name: 'ナレッジ検索',
        capability: 'query_knowledge',
        description: '関連するナレッジを検索',
        param_mappings: { query: 'search_query' },
      },
      {
        name: '要約生成',
        capability: 'generate_summary',
        description: '検索結果を要約',
        depends_on: ['ナレッジ検索'],
      },
    ],
    priority: 6,
  },
];

export const DEFAULT_PATTERNS: DecompositionPattern[] = [
  ...TASK_PATTERNS,
  ...MEETING_PATTERNS,
  ...ANNOUNCEMENT_PATTERNS,
  ...KNOWLEDGE_PATTERNS,
];
