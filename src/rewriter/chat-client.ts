import { z } from "zod";

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ChatRequest {
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
}

/** Anything that turns a chat transcript into the assistant's reply */
export interface ChatClient {
  complete(request: ChatRequest): Promise<string>;
}

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      })
    )
    .min(1),
});

export interface OpenRouterClientOptions {
  apiKey: string;
  model: string;
  baseUrl: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

/** Chat completions over the OpenAI-compatible OpenRouter API */
export class OpenRouterClient implements ChatClient {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: OpenRouterClientOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  async complete(request: ChatRequest): Promise<string> {
    const { apiKey, model, baseUrl, timeoutMs } = this.options;
    const res = await this.fetchImpl(`${baseUrl.replace(/\/+$/, "")}/chat/completions`, {
      method: "POST",
      headers: {
        authorization: `Bearer ${apiKey}`,
        "content-type": "application/json",
      },
      body: JSON.stringify({
        model,
        messages: request.messages,
        temperature: request.temperature,
        max_tokens: request.maxTokens,
      }),
      signal:
        timeoutMs !== undefined && timeoutMs > 0
          ? AbortSignal.timeout(timeoutMs)
          : undefined,
    });
    if (!res.ok) {
      throw new Error(`Chat completion failed: ${res.status} ${await res.text()}`);
    }

    const parsed = ChatCompletionSchema.parse(await res.json());
    const content = parsed.choices[0]?.message.content;
    if (!content) throw new Error("Chat completion returned no content");
    return content;
  }
}
