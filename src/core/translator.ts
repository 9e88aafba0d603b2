import OpenAI, { type ClientOptions } from 'openai';
import { z } from 'zod';
import { TranslationError, describeError } from '../utils/errors';

export interface Translator {
  /** Rejects with {@link TranslationError}. */
  translate(content: string): Promise<string>;
}

export interface TranslatorOptions {
  model: string;
  temperature: number;
  maxTokens?: number;
  systemPrompt: string;
  /** `{{source}}` is replaced with the file content. */
  userPrompt: string;
}

export const SOURCE_PLACEHOLDER = '{{source}}';

// Some compatible endpoints answer 200 with an `error` object and no choices.
const CompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({
            content: z.string().nullable().optional(),
          })
          .optional(),
      })
    )
    .optional(),
  error: z
    .object({
      message: z.string(),
    })
    .optional(),
});

/**
 * One client is shared by every file of a run. Retries are disabled: a failed
 * request fails its file.
 */
export function createOpenAIClient(options: {
  apiKey: string;
  baseURL?: string;
  fetch?: ClientOptions['fetch'];
}): OpenAI {
  return new OpenAI({
    apiKey: options.apiKey,
    baseURL: options.baseURL,
    fetch: options.fetch,
    maxRetries: 0,
  });
}

export function buildUserPrompt(template: string, content: string): string {
  return template.split(SOURCE_PLACEHOLDER).join(content);
}

export class OpenAITranslator implements Translator {
  private client: OpenAI;
  private options: TranslatorOptions;

  constructor(client: OpenAI, options: TranslatorOptions) {
    this.client = client;
    this.options = options;
  }

  async translate(content: string): Promise<string> {
    let response: unknown;

    try {
      response = await this.client.chat.completions.create({
        model: this.options.model,
        messages: [
          { role: 'system', content: this.options.systemPrompt },
          { role: 'user', content: buildUserPrompt(this.options.userPrompt, content) },
        ],
        temperature: this.options.temperature,
        ...(this.options.maxTokens !== undefined ? { max_tokens: this.options.maxTokens } : {}),
      });
    } catch (error) {
      throw toTranslationError(error);
    }

    const parsed = CompletionSchema.safeParse(response);
    if (!parsed.success) {
      throw new TranslationError('remote', 'Malformed response', { cause: parsed.error });
    }

    if (parsed.data.error) {
      throw new TranslationError('remote', parsed.data.error.message);
    }

    const text = parsed.data.choices?.[0]?.message?.content;
    if (text === undefined || text === null) {
      throw new TranslationError('empty', 'No result received');
    }

    return text;
  }
}

function toTranslationError(error: unknown): TranslationError {
  // APIConnectionError extends APIError, so it has to be checked first.
  if (error instanceof OpenAI.APIConnectionError) {
    const cause = error.cause instanceof Error ? error.cause.message : error.message;
    return new TranslationError('network', `Network error: ${cause}`, { cause: error });
  }

  if (error instanceof OpenAI.APIError) {
    const remoteMessage = extractErrorMessage(error.error);
    if (remoteMessage !== undefined) {
      return new TranslationError('remote', remoteMessage, { status: error.status, cause: error });
    }
    return new TranslationError('status', `Request failed with status ${error.status ?? 'unknown'}`, {
      status: error.status,
      cause: error,
    });
  }

  return new TranslationError('network', `Network error: ${describeError(error)}`, { cause: error });
}

function extractErrorMessage(body: unknown): string | undefined {
  if (typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string') {
    return body.message;
  }
  return undefined;
}
