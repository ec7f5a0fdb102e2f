import { SlotSnapshot, StepKind } from '../../types';

export interface ExtractionRequest {
  step: StepKind;
  text: string;
  state: SlotSnapshot;
}

/**
 * Turns one utterance into a sparse patch for the given step. Implementations may
 * resolve with anything; callers go through `extractPatch`, which keeps only a
 * well-formed mapping of the fields that step is allowed to produce.
 */
export interface ExtractionPort {
  readonly name: string;
  extract(request: ExtractionRequest, signal?: AbortSignal): Promise<unknown>;
}
