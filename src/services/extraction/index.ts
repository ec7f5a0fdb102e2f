import { ExtractionPort } from './types';
import { OpenAIExtractor, createOpenAICompletion } from './openai';
import { RuleBasedExtractor } from './rules';

export type ExtractorKind = 'openai' | 'rules';

export interface ExtractorSettings {
  kind: ExtractorKind;
  openai: {
    apiKey: string;
    model: string;
    baseURL?: string;
  };
}

export function createExtractor(settings: ExtractorSettings): ExtractionPort {
  if (settings.kind === 'rules') return new RuleBasedExtractor();
  return new OpenAIExtractor(createOpenAICompletion(settings.openai));
}

export { extractPatch, filterPatch, setPath, ExtractionTimeoutError } from './patch';
export { OpenAIExtractor, createOpenAICompletion } from './openai';
export { RuleBasedExtractor } from './rules';
export type { ExtractionPort, ExtractionRequest } from './types';
