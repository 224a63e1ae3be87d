// Language-model collaborator interface
// The core only needs: pick a tool (name + arguments) and judge a result

import type { ObjectJsonSchema } from '../services/tools/types.js';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ToolCall {
  id: string;
  name: string;
  arguments: string; // JSON string
}

export interface ProviderTool {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: ObjectJsonSchema;
  };
}

export interface ChatOptions {
  model: string;
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
  tools?: ProviderTool[];
  tool_choice?: 'auto' | 'none' | 'required';
  jsonResponse?: boolean;
}

export interface ProviderUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ChatResponse {
  content: string;
  toolCalls: ToolCall[];
  usage: ProviderUsage;
}

export interface ChatProvider {
  name: string;
  sendChat(messages: ChatMessage[], options: ChatOptions): Promise<ChatResponse>;
}
