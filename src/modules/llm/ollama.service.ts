import fetch from "node-fetch";
import { CompletionRequest, CompletionResponse, LlmBackend } from "./llm.types";

interface OllamaGenerateResponse {
  response?: string;
  model?: string;
  prompt_eval_count?: number;
  eval_count?: number;
}

export class OllamaBackend implements LlmBackend {
  readonly name = "ollama";

  constructor(private readonly baseUrl: string) {}

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const response = await fetch(`${this.baseUrl}/api/generate`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: request.model,
        prompt: request.prompt,
        stream: false,
        options: {
          ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
          ...(request.maxTokens !== undefined ? { num_predict: request.maxTokens } : {}),
        },
      }),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`Ollama error: ${text}`);
    }

    const data = (await response.json()) as OllamaGenerateResponse;

    if (!data.response) {
      throw new Error("Ollama returned an empty response.");
    }

    return {
      text: data.response,
      model: data.model ?? request.model,
      usage: {
        promptTokens: data.prompt_eval_count ?? 0,
        completionTokens: data.eval_count ?? 0,
      },
    };
  }
}
