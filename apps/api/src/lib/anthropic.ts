import Anthropic from '@anthropic-ai/sdk';

export interface GenerationParams {
  temperature: number;
  maxTokens: number;
}

/** A single-shot text generation backend. Any rejection means "it failed". */
export interface TextGenerator {
  readonly modelName: string;
  generate(prompt: string, params: GenerationParams): Promise<string>;
}

export class AnthropicTextGenerator implements TextGenerator {
  private readonly client: Anthropic;

  constructor(
    apiKey: string,
    readonly modelName: string
  ) {
    this.client = new Anthropic({ apiKey });
  }

  async generate(prompt: string, params: GenerationParams): Promise<string> {
    const response = await this.client.messages.create({
      model: this.modelName,
      max_tokens: params.maxTokens,
      temperature: params.temperature,
      messages: [{ role: 'user', content: prompt }],
    });

    return response.content
      .filter((block): block is Anthropic.TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('');
  }
}
