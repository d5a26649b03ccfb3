import { z } from "zod";
import { RemoteServiceError } from "../errors.js";
import type { LLMClient, LLMClientOptions, LLMRequest, LLMResponse } from "./index.js";

const ChatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }).optional(),
      })
    )
    .optional(),
  usage: z.object({ total_tokens: z.number().optional() }).optional(),
});

export class OpenAIClient implements LLMClient {
  private apiKey: string;
  private baseUrl: string;
  private defaultModel: string;
  private timeoutMs: number;

  constructor(options: LLMClientOptions = {}) {
    this.apiKey = options.apiKey ?? process.env.OPENAI_API_KEY ?? "";
    this.baseUrl = "https://api.openai.com/v1/chat/completions";
    this.defaultModel = options.model ?? "gpt-4o-mini";
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async call(request: LLMRequest): Promise<LLMResponse> {
    if (!this.apiKey) {
      throw new Error("OPENAI_API_KEY is not set");
    }

    const model = request.model || this.defaultModel;

    const response = await fetch(this.baseUrl, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model,
        messages: [
          { role: "system", content: request.systemPrompt },
          { role: "user", content: request.userPrompt },
        ],
        max_tokens: request.maxTokens || 500,
        temperature: request.temperature ?? 0.3,
        response_format: { type: "json_object" },
      }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      const errorBody = await response.text();
      throw new RemoteServiceError("OpenAI API", errorBody, response.status);
    }

    const data = ChatCompletionSchema.parse(await response.json());
    const choice = data.choices?.[0];

    return {
      content: choice?.message?.content || "",
      model: data.model || model,
      tokensUsed: data.usage?.total_tokens || 0,
    };
  }
}
