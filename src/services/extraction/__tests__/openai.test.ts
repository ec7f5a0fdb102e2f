import { describe, it, expect, vi } from 'vitest';
import { OpenAIExtractor, buildExtractionMessages } from '../openai';
import { ExtractionRequest } from '../types';
import { SlotStore } from '../../../onboarding/slot-store';

function requestFor(step: ExtractionRequest['step'], text: string): ExtractionRequest {
  return { step, text, state: new SlotStore().snapshot() };
}

describe('OpenAIExtractor', () => {
  it('takes the store name verbatim without calling the model', async () => {
    const complete = vi.fn();
    const extractor = new OpenAIExtractor(complete);
    expect(await extractor.extract(requestFor('store_name', '  123 Bistro '))).toEqual({ store_name: '123 Bistro' });
    expect(complete).not.toHaveBeenCalled();
  });

  it('parses a fenced JSON reply', async () => {
    const complete = vi.fn().mockResolvedValue('```json\n{"resources": [{"party_size": 4, "spots_total": 2}]}\n```');
    const extractor = new OpenAIExtractor(complete);
    expect(await extractor.extract(requestFor('resources', 'two 4-tops'))).toEqual({
      resources: [{ party_size: 4, spots_total: 2 }],
    });
  });

  it('passes the abort signal to the completion call', async () => {
    const complete = vi.fn().mockResolvedValue('{}');
    const controller = new AbortController();
    await new OpenAIExtractor(complete).extract(requestFor('duration', 'an hour'), controller.signal);
    expect(complete).toHaveBeenCalledWith(expect.any(Array), controller.signal);
  });

  it('rejects an empty or non-JSON reply', async () => {
    await expect(
      new OpenAIExtractor(vi.fn().mockResolvedValue(null)).extract(requestFor('duration', 'an hour')),
    ).rejects.toThrow('Empty response from extraction model');
    await expect(
      new OpenAIExtractor(vi.fn().mockResolvedValue('about an hour')).extract(requestFor('duration', 'an hour')),
    ).rejects.toThrow('Extraction model did not return a JSON object');
  });
});

describe('buildExtractionMessages', () => {
  it('sends the step, its expected shape and the reply', () => {
    const [system, user] = buildExtractionMessages(requestFor('duration', 'about 90 minutes'));
    expect(system.role).toBe('system');
    expect(user.role).toBe('user');
    expect(user.content).toContain('Step: duration\nExpected output: {"duration_sec": integer seconds > 0}');
    expect(user.content).toContain("Owner's reply:\nabout 90 minutes");
  });
});
