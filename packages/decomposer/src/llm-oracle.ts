import {
  OracleResponseSchema,
  createConsoleLogger,
  type DecompositionOracle,
  type LLMClient,
  type OracleSubTask,
  type WorkflowLogger,
} from '@taskflow/workflow-spec';
import type { CapabilitySpec } from '@taskflow/capabilities';

const MAX_LISTED_CAPABILITIES = 20;

export interface LLMDecompositionOracleOptions {
  /** 提示するケイパビリティ一覧 */
  capabilities: () => CapabilitySpec[];
  model?: string;
  logger?: WorkflowLogger;
}

/**
 * 分解用プロンプト作成
 */
export function buildDecompositionPrompt(
  request: string,
  capabilities: CapabilitySpec[],
  extractedParams: Record<string, unknown>
): string {
  const actions = capabilities
    .filter((c) => c.is_primary !== false)
    .slice(0, MAX_LISTED_CAPABILITIES)
    .map((c) => `- ${c.name}: ${c.description}`);

  return [
    '以下のユーザーリクエストを、実行可能なサブタスクに分解してください。',
    '',
    `リクエスト: ${request}`,
    '',
    '利用可能なアクション:',
    ...actions,
    '',
    '抽出済みパラメータ:',
    JSON.stringify(extractedParams),
    '',
    'JSON形式のみで回答してください:',
    '{"subtasks": [{"name": "タスク名", "description": "説明", "action": "アクション名", "params": {}, "depends_on": ["依存するタスク名"]}]}',
  ].join('\n');
}

/**
 * LLMの応答から分解結果を取り出す（解釈できなければ null）
 */
export function parseOracleResponse(content: string): OracleSubTask[] | null {
  const start = content.indexOf('{');
  const end = content.lastIndexOf('}');
  if (start < 0 || end <= start) {
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(content.slice(start, end + 1));
  } catch {
    return null;
  }

  const parsed = OracleResponseSchema.safeParse(json);
  if (!parsed.success || parsed.data.subtasks.length === 0) {
    return null;
  }
  return parsed.data.subtasks;
}

/**
 * LLMベースの分解オラクル作成
 */
export function createLLMDecompositionOracle(
  llm: LLMClient,
  options: LLMDecompositionOracleOptions
): DecompositionOracle {
  const logger = options.logger ?? createConsoleLogger('LLMOracle');

  return {
    async decompose(request, _context, extractedParams) {
      const response = await llm.chat({
        model: options.model,
        system: 'あなたは業務リクエストを実行手順に分解するアシスタントです。',
        messages: [
          {
            role: 'user',
            content: buildDecompositionPrompt(request, options.capabilities(), extractedParams),
          },
        ],
        max_tokens: 1024,
        temperature: 0,
      });

      const subtasks = parseOracleResponse(response.content);
      if (!subtasks) {
        logger.warn('Failed to parse LLM response', { length: response.content.length });
      }
      return subtasks;
    },
  };
}
