// OpenAI Provider
// Chat completions with function calling through the official SDK

import OpenAI from 'openai';
import { env } from '../env.js';
import type { ChatMessage, ChatOptions, ChatProvider, ChatResponse, ToolCall } from './types.js';

export class OpenAIProvider implements ChatProvider {
  name = 'openai';
  private client: OpenAI;

  constructor(apiKey: string = env.OPENAI_API_KEY) {
    if (!apiKey) {
      throw new Error('OPENAI_API_KEY is required');
    }
    this.client = new OpenAI({ apiKey });
  }

  async sendChat(messages: ChatMessage[], options: ChatOptions): Promise<ChatResponse> {
    const completion = await this.client.chat.completions.create(
      {
        model: options.model,
        messages: messages.map(m => ({ role: m.role, content: m.content })),
        temperature: options.temperature ?? 0,
        max_tokens: options.maxTokens ?? 1024,
        ...(options.tools && options.tools.length > 0
          ? { tools: options.tools, tool_choice: options.tool_choice ?? 'auto' }
          : {}),
        ...(options.jsonResponse ? { response_format: { type: 'json_object' as const } } : {}),
      },
      { signal: options.signal }
    );

    const choice = completion.choices[0];
    const toolCalls: ToolCall[] = (choice?.message.tool_calls ?? []).map(tc => ({
      id: tc.id,
      name: tc.function.name,
      arguments: tc.function.arguments,
    }));

    return {
      content: choice?.message.content ?? '',
      toolCalls,
      usage: {
        promptTokens: completion.usage?.prompt_tokens ?? 0,
        completionTokens: completion.usage?.completion_tokens ?? 0,
        totalTokens: completion.usage?.total_tokens ?? 0,
      },
    };
  }
}
