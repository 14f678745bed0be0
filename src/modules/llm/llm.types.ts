export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
}

export interface CompletionRequest {
  prompt: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
}

export interface CompletionResponse {
  text: string;
  usage: TokenUsage;
  model: string;
}

/**
 * A language-model provider. The generator and the judge each get their
 * own instance and depend on nothing but this interface.
 */
export interface LlmBackend {
  readonly name: string;
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}
