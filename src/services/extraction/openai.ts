import OpenAI from 'openai';
import { ExtractionPort, ExtractionRequest } from './types';
import { parseJsonObject } from './json';
import { getStep } from '../../steps';

export type ChatMessage = { role: 'system'; content: string } | { role: 'user'; content: string };

/** One chat round-trip returning the raw reply text, or null if the model sent none. */
export type CompletionFn = (messages: ChatMessage[], signal?: AbortSignal) => Promise<string | null>;

export interface OpenAICompletionOptions {
  apiKey: string;
  model: string;
  baseURL?: string;
}

export function createOpenAICompletion(options: OpenAICompletionOptions): CompletionFn {
  const openai = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL });

  return async (messages, signal) => {
    const response = await openai.chat.completions.create(
      {
        model: options.model,
        messages,
        temperature: 0.2,
        response_format: { type: 'json_object' },
      },
      { signal },
    );
    return response.choices[0]?.message?.content ?? null;
  };
}

const SYSTEM_PROMPT = `You extract structured fields from a restaurant owner's reply during onboarding for online reservations.
Respond ONLY with a single JSON object, no markdown or explanation.
Only include fields the reply actually states. If the reply is unclear or does not answer the question, respond with {}.`;

export function buildExtractionMessages(request: ExtractionRequest): ChatMessage[] {
  const step = getStep(request.step);
  const prompt = `Step: ${request.step}
Expected output: ${step.guide}

Owner's reply:
${request.text}

Collected so far:
${JSON.stringify(request.state)}`;

  return [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: prompt },
  ];
}

export class OpenAIExtractor implements ExtractionPort {
  readonly name = 'openai';

  constructor(private readonly complete: CompletionFn) {}

  async extract(request: ExtractionRequest, signal?: AbortSignal): Promise<unknown> {
    // Names are taken verbatim, without a model call.
    if (request.step === 'store_name') {
      const name = request.text.trim();
      return name ? { store_name: name } : {};
    }

    const content = await this.complete(buildExtractionMessages(request), signal);
    if (!content) throw new Error('Empty response from extraction model');
    const parsed = parseJsonObject(content);
    if (!parsed) throw new Error('Extraction model did not return a JSON object');
    return parsed;
  }
}
