import type { AppConfig } from "./config.js";
import type { MarketClient } from "./markets/index.js";
import { GammaMarketClient, MockMarketClient } from "./markets/index.js";
import type { NewsClient } from "./news/index.js";
import { MockNewsClient, NewsAPIClient } from "./news/index.js";
import type { LLMClient, LLMProvider } from "./llm/index.js";
import { createLLMClient } from "./llm/index.js";
import { EventSummarizer } from "./summarizer/index.js";

const API_KEY_VARIABLES: Record<Exclude<LLMProvider, "mock">, string> = {
  openai: "OPENAI_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
};

export interface Services {
  marketClient: MarketClient;
  newsClient: NewsClient;
  summarizer: EventSummarizer;
}

/**
 * Wires the remote clients from config. With `useMocks` every
 * collaborator is an offline fixture; otherwise the summarizer runs
 * without an LLM (headline fallback) when no key is configured.
 */
export function createServices(config: AppConfig): Services {
  if (config.useMocks) {
    return {
      marketClient: new MockMarketClient(),
      newsClient: new MockNewsClient(),
      summarizer: new EventSummarizer(createLLMClient("mock")),
    };
  }

  const keyVariable = API_KEY_VARIABLES[config.llm.provider];
  let llmClient: LLMClient | null = null;
  if (config.llm.apiKey) {
    llmClient = createLLMClient(config.llm.provider, {
      apiKey: config.llm.apiKey,
      model: config.llm.model,
      timeoutMs: config.timeoutMs,
    });
  } else {
    console.warn(
      `[summarizer] ${keyVariable} is not set; AI summaries disabled, using headline fallback`
    );
  }

  return {
    marketClient: new GammaMarketClient({
      baseUrl: config.gamma.baseUrl,
      timeoutMs: config.timeoutMs,
    }),
    newsClient: new NewsAPIClient({
      apiKey: config.news.apiKey,
      baseUrl: config.news.baseUrl,
      timeoutMs: config.timeoutMs,
    }),
    summarizer: new EventSummarizer(llmClient, {
      disabledReason: `AI summary unavailable (set ${keyVariable})`,
    }),
  };
}
