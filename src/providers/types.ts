export interface CompletionRequest {
  prompt: string;
  system?: string;
  maxTokens: number;
  model?: string;
  temperature?: number;
  /** Ask the provider for a JSON object response where it supports that */
  json?: boolean;
}

/**
 * Text-completion transport. Returns the raw response text or throws.
 */
export interface CompletionProvider {
  readonly name: string;
  readonly defaultModel: string;

  complete(request: CompletionRequest): Promise<string>;
  isAvailable(): boolean;
}

export interface ProviderConfig {
  apiKey?: string;
  baseUrl?: string;
  defaultModel?: string;
  /** Per-request timeout in ms */
  timeout?: number;
}
