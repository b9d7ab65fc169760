import OpenAI from 'openai';

export type GenerateOptions = {
  temperature?: number;
};

/** Single-shot text generation against the external model. Throws on any failure. */
export interface ModelClient {
  readonly model: string;
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

type OpenAiModelClientOptions = {
  apiKey: string;
  baseUrl: string;
  model: string;
};

export class OpenAiModelClient implements ModelClient {
  readonly model: string;

  private readonly client: OpenAI;

  constructor({ apiKey, baseUrl, model }: OpenAiModelClientOptions) {
    if (!apiKey) {
      throw new Error('LLM API key not configured. Set OPENAI_API_KEY to your provider token.');
    }

    this.model = model;
    this.client = new OpenAI({
      apiKey,
      baseURL: baseUrl,
      // Retries are owned by the gateway's policy.
      maxRetries: 0,
    });
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      temperature: options.temperature,
      messages: [{ role: 'user', content: prompt }],
    });

    const content = response.choices[0]?.message?.content;

    if (!content) {
      throw new Error('LLM response did not contain any content.');
    }

    return content;
  }
}
