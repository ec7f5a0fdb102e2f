import { FinalConfiguration } from '../types';

/**
 * Every slot passed its own validator but the assembled configuration did not.
 * This is a logic defect, not something the merchant can fix by answering again.
 */
export class OnboardingConsistencyError extends Error {
  constructor(
    readonly reason: string,
    readonly configuration: FinalConfiguration | null,
  ) {
    super(`Final configuration failed validation: ${reason}`);
    this.name = 'OnboardingConsistencyError';
  }
}

export class SessionNotFoundError extends Error {
  constructor(readonly sessionId: string) {
    super(`Onboarding session not found: ${sessionId}`);
    this.name = 'SessionNotFoundError';
  }
}

export class SessionBusyError extends Error {
  constructor(readonly sessionId: string) {
    super(`Onboarding session ${sessionId} is still processing the previous reply`);
    this.name = 'SessionBusyError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
