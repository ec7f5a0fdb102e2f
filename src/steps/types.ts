import { BusinessHoursEntry, SlotSnapshot, StepKind } from '../types';
import { ChoiceOption } from '../onboarding/choices';

export interface QuestionContext {
  slots: SlotSnapshot;
  /** Business hours awaiting the merchant's yes/no. */
  pendingBusinessHours: BusinessHoursEntry[] | null;
}

export interface StepDefinition {
  kind: StepKind;
  /** Slot paths ("resources", "strategy.max_party_size") this step may write. */
  accepts: readonly string[];
  question(ctx: QuestionContext): string;
  retryHint: string;
  choices?: readonly ChoiceOption[];
  multiSelect?: boolean;
  /** Expected output shape, handed to the extraction model. */
  guide: string;
}
