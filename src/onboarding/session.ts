import { randomUUID } from 'crypto';
import {
  BusinessHoursEntry,
  FinalConfiguration,
  Patch,
  Recommendation,
  SlotSnapshot,
  StepKind,
  Strategy,
} from '../types';
import { SlotStore } from './slot-store';
import { SIMPLIFIED_STRATEGY, deriveGoalType } from './strategy';
import { RecommendationInputs, applyRecommendationPatch, recommend } from './recommendation';
import { ValidationResult, validateBusinessHours, validateFinal } from './validators';
import { isSimplifyTrigger, matchChoice, matchChoices } from './choices';
import { formatDuration, renderRecommendation, summarizeBusinessHours, summarizeResources } from './render';
import { DECISION_CHOICES, StepDefinition, getStep } from '../steps';
import { ExtractionPort } from '../services/extraction/types';
import { extractPatch, setPath } from '../services/extraction/patch';
import { OnboardingConsistencyError } from '../utils/errors';
import { isRecord } from '../utils/guards';
import { Logger, logger as rootLogger } from '../utils/logger';

export type OnboardingState =
  | 'AskStoreName'
  | 'AskResources'
  | 'AskDuration'
  | 'AskBusinessHours'
  | 'ConfirmBusinessHours'
  | 'AskMergePolicy'
  | 'AskMaxPartySize'
  | 'AskOnlineRole'
  | 'AskPeakPeriod'
  | 'AskPeakRatio'
  | 'AskPeakStrategy'
  | 'AskNoShowTolerance'
  | 'DeriveGoalType'
  | 'ComputeRecommendation'
  | 'AcceptOrModifyRecommendation'
  | 'EmitFinal'
  | 'Completed';

type AskState = Exclude<
  OnboardingState,
  'DeriveGoalType' | 'ComputeRecommendation' | 'AcceptOrModifyRecommendation' | 'EmitFinal' | 'Completed'
>;

const STEP_FOR: Record<AskState, StepKind> = {
  AskStoreName: 'store_name',
  AskResources: 'resources',
  AskDuration: 'duration',
  AskBusinessHours: 'business_hours',
  ConfirmBusinessHours: 'business_hours_confirm',
  AskMergePolicy: 'merge_policy',
  AskMaxPartySize: 'max_party_size',
  AskOnlineRole: 'online_role',
  AskPeakPeriod: 'peak_period',
  AskPeakRatio: 'peak_ratio',
  AskPeakStrategy: 'peak_strategy',
  AskNoShowTolerance: 'no_show_tolerance',
};

const STRATEGY_STATES: readonly OnboardingState[] = [
  'AskMergePolicy',
  'AskMaxPartySize',
  'AskOnlineRole',
  'AskPeakPeriod',
  'AskPeakRatio',
  'AskPeakStrategy',
  'AskNoShowTolerance',
];

const STRATEGY_FIELD: Partial<Record<StepKind, keyof Strategy>> = {
  merge_policy: 'can_merge_tables',
  max_party_size: 'max_party_size',
  online_role: 'online_role',
  peak_period: 'peak_periods',
  peak_ratio: 'peak_online_quota_ratio',
  peak_strategy: 'peak_strategy',
  no_show_tolerance: 'no_show_tolerance',
};

function isAskState(state: OnboardingState): state is AskState {
  return state in STEP_FOR;
}

export interface SessionOptions {
  id?: string;
  storeId?: number | null;
  extractionTimeoutMs?: number;
  /** Let the extractor propose a clamped overlay on the computed recommendation. */
  enrichRecommendation?: boolean;
  logger?: Logger;
}

export interface TurnResult {
  sessionId: string;
  state: OnboardingState;
  message: string;
  /** Whether this turn's reply was taken (slot filled, choice made, or edit applied). */
  accepted: boolean;
  done: boolean;
  configuration?: FinalConfiguration;
}

const DEFAULT_EXTRACTION_TIMEOUT_MS = 20_000;
const ENRICHMENT_PROMPT = 'Suggest adjustments to this recommendation only if something in it is clearly unreasonable';

/**
 * One onboarding conversation. Owns its slot store exclusively; the host serializes
 * calls to `reply` so a session never sees two turns at once.
 */
export class OnboardingSession {
  readonly id: string;
  private readonly store: SlotStore;
  private readonly log: Logger;
  private readonly timeoutMs: number;
  private readonly enrich: boolean;
  private current: OnboardingState = 'AskStoreName';
  private readonly trace: OnboardingState[] = ['AskStoreName'];
  private pendingHours: BusinessHoursEntry[] | null = null;
  private rec: Recommendation | null = null;
  private awaitingEdit = false;
  private final: FinalConfiguration | null = null;

  constructor(
    private readonly extractor: ExtractionPort,
    options: SessionOptions = {},
  ) {
    this.id = options.id ?? randomUUID();
    this.store = new SlotStore(options.storeId ?? null);
    this.timeoutMs = options.extractionTimeoutMs ?? DEFAULT_EXTRACTION_TIMEOUT_MS;
    this.enrich = options.enrichRecommendation ?? false;
    this.log = (options.logger ?? rootLogger).child({ sessionId: this.id });
  }

  get state(): OnboardingState {
    return this.current;
  }

  get visited(): OnboardingState[] {
    return [...this.trace];
  }

  get done(): boolean {
    return this.current === 'Completed';
  }

  get recommendation(): Recommendation | null {
    return this.rec ? structuredClone(this.rec) : null;
  }

  get configuration(): FinalConfiguration | null {
    return this.final ? structuredClone(this.final) : null;
  }

  snapshot(): SlotSnapshot {
    return this.store.snapshot();
  }

  /** The prompt for the current state, without consuming a reply. */
  start(): TurnResult {
    return this.result(this.prompt(), false);
  }

  async reply(text: string): Promise<TurnResult> {
    if (this.current === 'Completed') {
      return this.result('Onboarding is already complete.', false);
    }
    if (this.current === 'AcceptOrModifyRecommendation') {
      return this.decide(text);
    }
    if (!isAskState(this.current)) {
      throw new OnboardingConsistencyError(`cannot take a reply in state ${this.current}`, null);
    }
    if (STRATEGY_STATES.includes(this.current) && isSimplifyTrigger(text)) {
      return this.simplify();
    }

    const step = getStep(STEP_FOR[this.current]);
    const patch = this.fastPatch(step, text) ?? (text.trim() ? await this.extract(step, text) : {});
    const outcome = this.apply(step, patch);

    if (!outcome.ok) {
      this.log.debug('Reply not accepted', { state: this.current, reason: outcome.reason });
      return this.result(`${step.retryHint}\n\n${this.prompt()}`, false);
    }

    await this.goto(outcome.value.next);
    const message = outcome.value.note ? `${outcome.value.note}\n\n${this.prompt()}` : this.prompt();
    return this.result(message, true);
  }

  private result(message: string, accepted: boolean): TurnResult {
    const turn: TurnResult = { sessionId: this.id, state: this.current, message, accepted, done: this.done };
    if (this.final) turn.configuration = structuredClone(this.final);
    return turn;
  }

  private prompt(): string {
    if (this.current === 'Completed') return this.completionMessage();
    if (this.current === 'AcceptOrModifyRecommendation') {
      return this.rec ? renderRecommendation(this.rec) : '';
    }
    if (!isAskState(this.current)) return '';
    return getStep(STEP_FOR[this.current]).question({
      slots: this.store.snapshot(),
      pendingBusinessHours: this.pendingHours,
    });
  }

  private completionMessage(): string {
    if (!this.final) return 'Onboarding is complete.';
    return [
      `All set! Online reservations for ${this.final.store_name} are configured.`,
      `Tables: ${summarizeResources(this.final.resources)} (${this.final.capacity_hint} seats)`,
      `Typical stay: ${formatDuration(this.final.duration_sec)}`,
      `Opening hours: ${summarizeBusinessHours(this.final.business_hours)}`,
      `Latest online booking start: ${summarizeBusinessHours(this.final.booking_hours)}`,
    ].join('\n');
  }

  private fastPatch(step: StepDefinition, text: string): Patch | null {
    if (step.choices) {
      const single = matchChoice(text, step.choices);
      const picked = step.multiSelect ? matchChoices(text, step.choices) : single ? [single] : null;
      if (picked) {
        const values = [...new Set(picked.map((o) => o.value))];
        return setPath(step.accepts[0], step.multiSelect ? values : values[0]);
      }
    }
    if (step.kind === 'max_party_size') {
      const leading = /^\s*(\d+)/.exec(text);
      if (leading) return setPath(step.accepts[0], parseInt(leading[1], 10));
    }
    return null;
  }

  private extract(step: StepDefinition, text: string, state: SlotSnapshot = this.store.snapshot()): Promise<Patch> {
    return extractPatch(
      this.extractor,
      { step: step.kind, text, state },
      { timeoutMs: this.timeoutMs, accepts: step.accepts, logger: this.log },
    );
  }

  /** Validates and commits one step's patch, returning the state to go to next. */
  private apply(step: StepDefinition, patch: Patch): ValidationResult<{ next: OnboardingState; note?: string }> {
    const strategy = isRecord(patch.strategy) ? patch.strategy : {};

    switch (step.kind) {
      case 'store_name': {
        const r = this.store.commitStoreName(patch.store_name);
        return r.ok ? advance('AskResources') : r;
      }
      case 'resources': {
        const r = this.store.commitResources(patch.resources);
        return r.ok ? advance('AskDuration') : r;
      }
      case 'duration': {
        const r = this.store.commitDuration(patch.duration_sec);
        return r.ok ? advance('AskBusinessHours') : r;
      }
      case 'business_hours': {
        const r = validateBusinessHours(patch.business_hours);
        if (!r.ok) return r;
        this.pendingHours = r.value;
        return advance('ConfirmBusinessHours');
      }
      case 'business_hours_confirm': {
        if (typeof patch.confirm !== 'boolean') return { ok: false, reason: 'confirm must be a boolean' };
        if (!patch.confirm || !this.pendingHours) {
          this.pendingHours = null;
          return advance('AskBusinessHours', "No problem, let's try again.");
        }
        const r = this.store.commitBusinessHours(this.pendingHours);
        if (!r.ok) return r;
        this.pendingHours = null;
        return advance('AskMergePolicy');
      }
      case 'merge_policy': {
        const r = this.commitStrategyField(step.kind, strategy);
        if (!r.ok) return r;
        if (r.value.can_merge_tables) return advance('AskMaxPartySize');
        const largest = Math.max(...(this.store.currentResources ?? []).map((t) => t.party_size));
        const max = this.store.commitStrategy({ max_party_size: largest });
        return max.ok ? advance('AskOnlineRole') : max;
      }
      case 'max_party_size':
        return this.commitAndAdvance(step.kind, strategy, 'AskOnlineRole');
      case 'online_role':
        return this.commitAndAdvance(step.kind, strategy, 'AskPeakPeriod');
      case 'peak_period':
        return this.commitAndAdvance(step.kind, strategy, 'AskPeakRatio');
      case 'peak_ratio':
        return this.commitAndAdvance(step.kind, strategy, 'AskPeakStrategy');
      case 'peak_strategy':
        return this.commitAndAdvance(step.kind, strategy, 'AskNoShowTolerance');
      case 'no_show_tolerance':
        return this.commitAndAdvance(step.kind, strategy, 'DeriveGoalType');
      case 'recommendation_patch':
        return { ok: false, reason: 'recommendation edits are handled by the accept/modify loop' };
    }
  }

  private commitStrategyField(kind: StepKind, strategy: Record<string, unknown>): ValidationResult<Partial<Strategy>> {
    const field = STRATEGY_FIELD[kind];
    if (!field) return { ok: false, reason: `${kind} does not write a strategy field` };
    if (!(field in strategy)) return { ok: false, reason: `strategy.${field} is required` };
    return this.store.commitStrategy({ [field]: strategy[field] });
  }

  private commitAndAdvance(
    kind: StepKind,
    strategy: Record<string, unknown>,
    next: OnboardingState,
  ): ValidationResult<{ next: OnboardingState }> {
    const r = this.commitStrategyField(kind, strategy);
    return r.ok ? advance(next) : r;
  }

  private async simplify(): Promise<TurnResult> {
    const r = this.store.commitStrategy(SIMPLIFIED_STRATEGY);
    if (!r.ok) throw new OnboardingConsistencyError(r.reason, null);
    this.log.info('Default strategy applied', { from: this.current });
    await this.goto('DeriveGoalType');
    return this.result(`No problem, I'll pick sensible defaults for you.\n\n${this.prompt()}`, true);
  }

  private enter(state: OnboardingState): void {
    this.log.debug('State transition', { from: this.current, to: state });
    this.current = state;
    this.trace.push(state);
  }

  /** Enters `state`, then runs any automatic states until one needs a reply. */
  private async goto(state: OnboardingState): Promise<void> {
    this.enter(state);
    for (;;) {
      switch (this.current) {
        case 'DeriveGoalType': {
          const strategy = this.store.currentStrategy;
          if (strategy.goal_type === undefined) {
            const r = this.store.commitStrategy({ goal_type: deriveGoalType(strategy.online_role) });
            if (!r.ok) throw new OnboardingConsistencyError(r.reason, null);
          }
          this.enter('ComputeRecommendation');
          break;
        }
        case 'ComputeRecommendation':
          this.rec = await this.computeRecommendation();
          this.enter('AcceptOrModifyRecommendation');
          break;
        case 'EmitFinal':
          this.final = this.emitFinal();
          this.log.info('Onboarding completed', { storeName: this.final.store_name });
          this.enter('Completed');
          return;
        default:
          return;
      }
    }
  }

  private recommendationInputs(): RecommendationInputs {
    const slots = this.store.snapshot();
    const s = slots.strategy;
    if (
      slots.business_hours === null ||
      slots.duration_sec === null ||
      slots.resources === null ||
      slots.capacity_hint === null ||
      s.goal_type === undefined ||
      s.no_show_tolerance === undefined ||
      s.peak_strategy === undefined ||
      s.peak_online_quota_ratio === undefined
    ) {
      throw new OnboardingConsistencyError('recommendation inputs are incomplete', null);
    }
    return {
      business_hours: slots.business_hours,
      duration_sec: slots.duration_sec,
      resources: slots.resources,
      capacity_hint: slots.capacity_hint,
      goal_type: s.goal_type,
      no_show_tolerance: s.no_show_tolerance,
      peak_strategy: s.peak_strategy,
      peak_online_quota_ratio: s.peak_online_quota_ratio,
    };
  }

  private async computeRecommendation(): Promise<Recommendation> {
    const inputs = this.recommendationInputs();
    const computed = recommend(inputs);
    if (!this.enrich) return computed;

    const text = `${ENRICHMENT_PROMPT}:\n${JSON.stringify(computed)}`;
    const patch = await this.extract(getStep('recommendation_patch'), text, this.preview(computed));
    const { recommendation, changed, ignored } = applyRecommendationPatch(computed, inputs, patch);
    if (changed.length || ignored.length) {
      this.log.info('Recommendation enriched', { changed, ignored });
    }
    return recommendation;
  }

  /** The slot snapshot with the recommendation under discussion filled in. */
  private preview(rec: Recommendation): SlotSnapshot {
    return {
      ...this.store.snapshot(),
      booking_hours: rec.booking_hours,
      peak_policy: rec.policy,
      peak_online_resources: rec.peak_online_resources,
    };
  }

  private async decide(text: string): Promise<TurnResult> {
    const rec = this.rec;
    if (!rec) throw new OnboardingConsistencyError('no recommendation to decide on', null);
    const decision = matchChoice(text, DECISION_CHOICES)?.value;

    if (decision === 'accept') {
      const r = this.store.acceptRecommendation(rec);
      if (!r.ok) throw new OnboardingConsistencyError(r.reason, null);
      this.awaitingEdit = false;
      await this.goto('EmitFinal');
      return this.result(this.prompt(), true);
    }

    if (this.awaitingEdit) {
      this.awaitingEdit = false;
      const step = getStep('recommendation_patch');
      const patch = text.trim() ? await this.extract(step, text, this.preview(rec)) : {};
      const { recommendation, changed, ignored } = applyRecommendationPatch(rec, this.recommendationInputs(), patch);
      if (ignored.length) this.log.debug('Recommendation edits ignored', { ignored });
      if (!changed.length) {
        return this.result(`I couldn't find anything to change in that.\n\n${renderRecommendation(rec)}`, false);
      }
      this.rec = recommendation;
      return this.result(`Updated: ${changed.join(', ')}.\n\n${renderRecommendation(recommendation)}`, true);
    }

    if (decision === 'modify') {
      this.awaitingEdit = true;
      return this.result(
        getStep('recommendation_patch').question({ slots: this.preview(rec), pendingBusinessHours: null }),
        true,
      );
    }

    return this.result(`Please reply A to accept or B to modify.\n\n${renderRecommendation(rec)}`, false);
  }

  private emitFinal(): FinalConfiguration {
    const assembled = this.store.assemble();
    if (!assembled.ok) {
      this.log.error('Final configuration could not be assembled', { reason: assembled.reason });
      throw new OnboardingConsistencyError(assembled.reason, null);
    }
    const checked = validateFinal(assembled.value);
    if (!checked.ok) {
      this.log.error('Final configuration failed validation', { reason: checked.reason });
      throw new OnboardingConsistencyError(checked.reason, assembled.value);
    }
    return assembled.value;
  }
}

function advance<N extends OnboardingState>(next: N, note?: string): ValidationResult<{ next: N; note?: string }> {
  return { ok: true, reason: 'ok', value: note ? { next, note } : { next } };
}
