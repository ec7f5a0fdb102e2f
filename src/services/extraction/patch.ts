import { ExtractionPort, ExtractionRequest } from './types';
import { Patch } from '../../types';
import { isRecord } from '../../utils/guards';
import { errorMessage } from '../../utils/errors';
import { Logger, logger as rootLogger } from '../../utils/logger';

export class ExtractionTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Extraction timed out after ${timeoutMs}ms`);
    this.name = 'ExtractionTimeoutError';
  }
}

/** Builds `{strategy: {max_party_size: 12}}` from `"strategy.max_party_size"`. */
export function setPath(path: string, value: unknown): Patch {
  const [head, tail] = path.split('.', 2);
  return tail === undefined ? { [head]: value } : { [head]: { [tail]: value } };
}

/**
 * Keeps only whitelisted paths. A nested field the model returned at the top level
 * (`{"max_party_size": 12}` for `strategy.max_party_size`) is moved under its parent.
 */
export function filterPatch(raw: unknown, accepts: readonly string[]): Patch {
  if (!isRecord(raw)) return {};
  const out: Patch = {};

  for (const path of accepts) {
    const [head, tail] = path.split('.', 2);
    if (tail === undefined) {
      if (head in raw) out[head] = raw[head];
      continue;
    }
    const parent = raw[head];
    let value: unknown;
    if (isRecord(parent) && tail in parent) value = parent[tail];
    else if (tail in raw) value = raw[tail];
    else continue;

    const existing = out[head];
    const target: Record<string, unknown> = isRecord(existing) ? existing : {};
    target[tail] = value;
    out[head] = target;
  }
  return out;
}

export interface ExtractPatchOptions {
  timeoutMs: number;
  accepts: readonly string[];
  logger?: Logger;
}

/**
 * Calls the port with a bounded timeout. Never rejects: a failure, a timeout or a
 * non-object result all come back as an empty patch.
 */
export async function extractPatch(
  port: ExtractionPort,
  request: ExtractionRequest,
  options: ExtractPatchOptions,
): Promise<Patch> {
  const log = options.logger ?? rootLogger;
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new ExtractionTimeoutError(options.timeoutMs));
    }, options.timeoutMs);
  });

  try {
    const raw = await Promise.race([port.extract(request, controller.signal), timeout]);
    if (!isRecord(raw)) {
      log.warn('Extractor returned a non-object, treating as empty patch', { step: request.step, extractor: port.name });
      return {};
    }
    return filterPatch(raw, options.accepts);
  } catch (err) {
    log.warn('Extraction failed, treating as empty patch', {
      step: request.step,
      extractor: port.name,
      error: errorMessage(err),
    });
    return {};
  } finally {
    clearTimeout(timer);
  }
}
