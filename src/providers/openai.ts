import OpenAI from 'openai';
import { BaseCompletionProvider } from './base.js';
import type { CompletionRequest, ProviderConfig } from './types.js';

export class OpenAICompletionProvider extends BaseCompletionProvider {
  readonly name = 'openai';
  readonly defaultModel = 'gpt-4o';

  private client: OpenAI | null = null;

  constructor(config: ProviderConfig = {}) {
    super(config);
  }

  private getClient(): OpenAI {
    if (!this.client) {
      this.client = new OpenAI({
        apiKey: this.config.apiKey,
        ...(this.config.baseUrl ? { baseURL: this.config.baseUrl } : {}),
        maxRetries: 0,
      });
    }
    return this.client;
  }

  isAvailable(): boolean {
    return !!this.config.apiKey;
  }

  protected async _complete(request: CompletionRequest & { model: string }): Promise<string> {
    const messages: OpenAI.ChatCompletionMessageParam[] = [];
    if (request.system) {
      messages.push({ role: 'system', content: request.system });
    }
    messages.push({ role: 'user', content: request.prompt });

    const response = await this.getClient().chat.completions.create({
      model: request.model,
      messages,
      max_tokens: request.maxTokens,
      ...(request.json ? { response_format: { type: 'json_object' as const } } : {}),
      ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
    });

    return response.choices[0]?.message.content || '';
  }
}
