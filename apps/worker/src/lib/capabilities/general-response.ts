/**
 * General Response Capability
 *
 * 分解されなかったリクエストにLLMで応答する
 */

import { z } from 'zod';
import type { CapabilityHandler, LLMClient } from '@taskflow/workflow-spec';
import type { CapabilitySpec } from '@taskflow/capabilities';

/**
 * 入力スキーマ
 */
export const inputSchema = z.object({
  original_request: z.string().min(1),
});

export type Input = z.infer<typeof inputSchema>;

/**
 * ケイパビリティ仕様
 */
export const spec: CapabilitySpec = {
  name: 'general_response',
  description: '一般的な質問や依頼にテキストで応答する',
  is_primary: false,
  category: 'general',
};

const SYSTEM_PROMPT = `あなたは社内チャットのアシスタントです。
- 依頼に対して簡潔に日本語で回答してください
- 実行できない操作を実行したとは言わないでください`;

/**
 * ハンドラー作成（LLM注入）
 */
export function createGeneralResponseHandler(llm: LLMClient): CapabilityHandler {
  return async (params, context) => {
    const parsed = inputSchema.parse(params);

    context.logger.info('Generating general response', { attempt: context.attempt });

    const response = await llm.chat({
      system: SYSTEM_PROMPT,
      messages: [{ role: 'user', content: parsed.original_request }],
      max_tokens: 1024,
      temperature: 0.3,
    });

    const message = response.content.trim();
    if (message.length === 0) {
      return { success: false, error: 'Empty response from LLM' };
    }

    return {
      success: true,
      message,
      data: {
        model: response.model,
        tokens_used: response.tokens_used.input + response.tokens_used.output,
      },
    };
  };
}
