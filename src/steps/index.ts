import { StepDefinition } from './types';
import { StepKind } from '../types';
import { businessHoursConfirmStep, businessHoursStep, durationStep, resourcesStep, storeNameStep } from './basics';
import {
  maxPartySizeStep,
  mergePolicyStep,
  noShowToleranceStep,
  onlineRoleStep,
  peakPeriodStep,
  peakRatioStep,
  peakStrategyStep,
} from './strategy';
import { recommendationPatchStep } from './recommendation';

const steps: Record<StepKind, StepDefinition> = {
  store_name: storeNameStep,
  resources: resourcesStep,
  duration: durationStep,
  business_hours: businessHoursStep,
  business_hours_confirm: businessHoursConfirmStep,
  merge_policy: mergePolicyStep,
  max_party_size: maxPartySizeStep,
  online_role: onlineRoleStep,
  peak_period: peakPeriodStep,
  peak_ratio: peakRatioStep,
  peak_strategy: peakStrategyStep,
  no_show_tolerance: noShowToleranceStep,
  recommendation_patch: recommendationPatchStep,
};

export function getStep(kind: StepKind): StepDefinition {
  const step = steps[kind];
  if (!step) throw new Error(`Unknown step: ${kind}`);
  return step;
}

export { steps };
export { DECISION_CHOICES } from './recommendation';
export type { StepDefinition, QuestionContext } from './types';
