// Provider Registry
// Lazily constructed language-model providers

import type { ChatProvider } from './types.js';
import { OpenAIProvider } from './openai.js';
import { isProviderConfigured } from '../env.js';

const providers: Map<string, ChatProvider> = new Map();

function getOrCreateProvider(name: string): ChatProvider | null {
  const cached = providers.get(name);
  if (cached) {
    return cached;
  }

  if (!isProviderConfigured(name)) {
    return null;
  }

  let provider: ChatProvider | null = null;

  switch (name) {
    case 'openai':
      provider = new OpenAIProvider();
      break;
    default:
      return null;
  }

  providers.set(name, provider);
  return provider;
}

export function findProvider(name: string): ChatProvider | null {
  return getOrCreateProvider(name);
}

export type { ChatProvider, ChatMessage, ChatOptions, ChatResponse, ToolCall, ProviderTool } from './types.js';
