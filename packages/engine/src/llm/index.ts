import { OpenAIClient } from "./openai.js";
import { AnthropicClient } from "./anthropic.js";
import { MockLLMClient } from "./mock.js";

export interface LLMRequest {
  systemPrompt: string;
  userPrompt: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

export interface LLMResponse {
  content: string;
  model: string;
  tokensUsed: number;
}

export interface LLMClient {
  call(request: LLMRequest): Promise<LLMResponse>;
}

export interface LLMClientOptions {
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
}

export type LLMProvider = "openai" | "anthropic" | "mock";

export { OpenAIClient, AnthropicClient, MockLLMClient };

export function createLLMClient(
  provider: LLMProvider,
  options: LLMClientOptions = {}
): LLMClient {
  switch (provider) {
    case "openai":
      return new OpenAIClient(options);
    case "anthropic":
      return new AnthropicClient(options);
    case "mock":
      return new MockLLMClient();
  }
}
