import { z } from 'zod';

export interface OpenAiClientOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

export interface ChatCompletionParams {
  temperature: number;
  maxTokens?: number;
  presencePenalty?: number;
  frequencyPenalty?: number;
}

const chatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({
            content: z.string().nullable().optional()
          })
          .optional()
      })
    )
    .default([])
});

async function readErrorDetail(response: Response): Promise<string> {
  const text = await response.text();
  return text.trim().length > 0 ? text.trim() : response.statusText;
}

/** Minimal chat-completions call; returns the first non-empty message text. */
export async function createChatCompletion(
  options: OpenAiClientOptions,
  messages: ChatMessage[],
  params: ChatCompletionParams
): Promise<string> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetchImpl(`${options.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        accept: 'application/json',
        authorization: `Bearer ${options.apiKey}`
      },
      body: JSON.stringify({
        model: options.model,
        messages,
        temperature: params.temperature,
        max_tokens: params.maxTokens,
        presence_penalty: params.presencePenalty ?? 0,
        frequency_penalty: params.frequencyPenalty ?? 0
      }),
      signal: controller.signal
    });

    if (!response.ok) {
      throw new Error(`OpenAI request failed (${response.status}): ${await readErrorDetail(response)}`);
    }

    const payload = chatCompletionResponseSchema.parse(await response.json());
    for (const choice of payload.choices) {
      const content = choice.message?.content?.trim();
      if (content) {
        return content;
      }
    }
    throw new Error('OpenAI response did not include any output text');
  } catch (err) {
    if (err instanceof Error && err.name === 'AbortError') {
      throw new Error('OpenAI request timed out');
    }
    throw err;
  } finally {
    clearTimeout(timeout);
  }
}
