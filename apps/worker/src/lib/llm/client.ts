import Anthropic from '@anthropic-ai/sdk';
import type { LLMClient, LLMChatParams, LLMChatResponse } from '@taskflow/workflow-spec';

export const DEFAULT_LLM_MODEL = 'claude-sonnet-4-20250514';

export interface LLMClientOptions {
  apiKey?: string;
  defaultModel?: string;
}

/**
 * Anthropic Claude クライアント
 */
export function createLLMClient(options: LLMClientOptions = {}): LLMClient {
  const client = new Anthropic({
    apiKey: options.apiKey ?? process.env.ANTHROPIC_API_KEY,
  });

  return {
    async chat(params: LLMChatParams): Promise<LLMChatResponse> {
      const response = await client.messages.create({
        model: params.model ?? options.defaultModel ?? DEFAULT_LLM_MODEL,
        max_tokens: params.max_tokens ?? 4096,
        system: params.system,
        messages: params.messages.map((msg) => ({
          role: msg.role,
          content: msg.content,
        })),
        temperature: params.temperature,
      });

      // テキストコンテンツを抽出
      const textContent = response.content.find((c) => c.type === 'text');
      const content = textContent?.type === 'text' ? textContent.text : '';

      return {
        content,
        tokens_used: {
          input: response.usage.input_tokens,
          output: response.usage.output_tokens,
        },
        model: response.model,
      };
    },
  };
}
