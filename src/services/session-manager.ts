import { OnboardingSession, SessionOptions, TurnResult } from '../onboarding/session';
import { ExtractionPort } from './extraction/types';
import { SessionBusyError, SessionNotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';

export type SessionDefaults = Omit<SessionOptions, 'id' | 'storeId'>;

export interface RegistryOptions {
  /** Sessions without a reply for this long are discarded. */
  idleTtlMs?: number;
  /** Completed sessions are kept this long after their last reply. */
  completedTtlMs?: number;
  sweepIntervalMs?: number;
}

const DEFAULT_IDLE_TTL_MS = 30 * 60_000;
const DEFAULT_COMPLETED_TTL_MS = 5 * 60_000;
const DEFAULT_SWEEP_INTERVAL_MS = 60_000;

interface Entry {
  session: OnboardingSession;
  lastActive: number;
}

/**
 * Live onboarding sessions keyed by id. Each session owns its own slot store; the
 * registry only routes turns and refuses a second turn while one is in flight.
 * Idle and completed sessions are pruned on a timer.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, Entry>();
  private readonly busy = new Set<string>();
  private readonly idleTtlMs: number;
  private readonly completedTtlMs: number;
  private sweeper: NodeJS.Timeout | null;

  constructor(
    private readonly extractor: ExtractionPort,
    private readonly defaults: SessionDefaults = {},
    options: RegistryOptions = {},
  ) {
    this.idleTtlMs = options.idleTtlMs ?? DEFAULT_IDLE_TTL_MS;
    this.completedTtlMs = options.completedTtlMs ?? DEFAULT_COMPLETED_TTL_MS;
    this.sweeper = setInterval(() => this.sweep(), options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS);
    this.sweeper.unref();
  }

  get size(): number {
    return this.sessions.size;
  }

  create(storeId: number | null = null): OnboardingSession {
    const session = new OnboardingSession(this.extractor, { ...this.defaults, storeId });
    this.sessions.set(session.id, { session, lastActive: Date.now() });
    logger.info('Onboarding session created', { sessionId: session.id, storeId });
    return session;
  }

  get(sessionId: string): OnboardingSession {
    const entry = this.sessions.get(sessionId);
    if (!entry) throw new SessionNotFoundError(sessionId);
    return entry.session;
  }

  async reply(sessionId: string, text: string): Promise<TurnResult> {
    const entry = this.sessions.get(sessionId);
    if (!entry) throw new SessionNotFoundError(sessionId);
    if (this.busy.has(sessionId)) throw new SessionBusyError(sessionId);

    this.busy.add(sessionId);
    try {
      return await entry.session.reply(text);
    } finally {
      entry.lastActive = Date.now();
      this.busy.delete(sessionId);
    }
  }

  delete(sessionId: string): void {
    if (!this.sessions.delete(sessionId)) throw new SessionNotFoundError(sessionId);
    this.busy.delete(sessionId);
    logger.info('Onboarding session discarded', { sessionId });
  }

  /** Drops sessions past their TTL; a session mid-turn is never dropped. */
  sweep(now: number = Date.now()): void {
    for (const [id, { session, lastActive }] of this.sessions) {
      if (this.busy.has(id)) continue;
      const ttl = session.done ? this.completedTtlMs : this.idleTtlMs;
      if (now - lastActive > ttl) {
        this.sessions.delete(id);
        logger.info('Onboarding session expired', { sessionId: id, done: session.done });
      }
    }
  }

  /** Stops the sweep timer. */
  close(): void {
    if (this.sweeper) clearInterval(this.sweeper);
    this.sweeper = null;
  }
}
