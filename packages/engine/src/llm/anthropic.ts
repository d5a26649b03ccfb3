import { z } from "zod";
import { RemoteServiceError } from "../errors.js";
import type { LLMClient, LLMClientOptions, LLMRequest, LLMResponse } from "./index.js";

const MessagesResponseSchema = z.object({
  model: z.string().optional(),
  content: z
    .array(z.object({ type: z.string(), text: z.string().optional() }))
    .optional(),
  usage: z
    .object({
      input_tokens: z.number().optional(),
      output_tokens: z.number().optional(),
    })
    .optional(),
});

/**
 * Anthropic Messages API adapter, over raw fetch() rather than the SDK.
 *
 * Key Anthropic API specifics:
 * - System prompt is a top-level field, NOT a message role
 * - Requires "anthropic-version" header for API versioning
 * - Response body nests text inside a content[] array of typed blocks
 */
export class AnthropicClient implements LLMClient {
  private apiKey: string;
  private baseUrl: string;
  private defaultModel: string;
  private timeoutMs: number;

  constructor(options: LLMClientOptions = {}) {
    this.apiKey = options.apiKey ?? process.env.ANTHROPIC_API_KEY ?? "";
    this.baseUrl = "https://api.anthropic.com/v1/messages";
    this.defaultModel = options.model ?? "claude-3-5-haiku-latest";
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async call(request: LLMRequest): Promise<LLMResponse> {
    if (!this.apiKey) {
      throw new Error("ANTHROPIC_API_KEY is not set");
    }

    const model = request.model || this.defaultModel;

    const response = await fetch(this.baseUrl, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "x-api-key": this.apiKey,
        "anthropic-version": "2023-06-01",
      },
      body: JSON.stringify({
        model,
        system: request.systemPrompt,
        messages: [{ role: "user", content: request.userPrompt }],
        max_tokens: request.maxTokens || 500,
        temperature: request.temperature ?? 0.3,
      }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      const errorBody = await response.text();
      throw new RemoteServiceError("Anthropic API", errorBody, response.status);
    }

    const data = MessagesResponseSchema.parse(await response.json());
    const textBlock = data.content?.find((block) => block.type === "text");

    return {
      content: textBlock?.text || "",
      model: data.model || model,
      tokensUsed:
        (data.usage?.input_tokens || 0) + (data.usage?.output_tokens || 0),
    };
  }
}
