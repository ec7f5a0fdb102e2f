import { Response, Router } from 'express';
import { z } from 'zod';
import { SessionRegistry } from '../../services/session-manager';
import { OnboardingConsistencyError, SessionBusyError, SessionNotFoundError, errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';

const createSessionSchema = z.object({
  storeId: z.number().int().nullable().optional(),
});

const messageSchema = z.object({
  text: z.string().min(1).max(2000),
});

function handleError(res: Response, err: unknown, action: string, sessionId?: string) {
  if (err instanceof z.ZodError) {
    res.status(400).json({ error: 'Validation error', details: err.issues });
    return;
  }
  if (err instanceof SessionNotFoundError) {
    res.status(404).json({ error: 'Session not found' });
    return;
  }
  if (err instanceof SessionBusyError) {
    res.status(409).json({ error: 'Session is busy with a previous message' });
    return;
  }
  if (err instanceof OnboardingConsistencyError) {
    logger.error('Onboarding consistency failure', { sessionId, reason: err.reason, configuration: err.configuration });
  } else {
    logger.error(`Error ${action}`, { sessionId, error: errorMessage(err) });
  }
  res.status(500).json({ error: 'Internal server error' });
}

export function createOnboardingRouter(registry: SessionRegistry): Router {
  const router = Router();

  // POST /api/onboarding: start a session and return its first question
  router.post('/', (req, res) => {
    try {
      const parsed = createSessionSchema.parse(req.body ?? {});
      const session = registry.create(parsed.storeId ?? null);
      res.status(201).json(session.start());
    } catch (err) {
      handleError(res, err, 'creating onboarding session');
    }
  });

  // POST /api/onboarding/:id/messages: one merchant reply
  router.post('/:id/messages', async (req, res) => {
    try {
      const { text } = messageSchema.parse(req.body);
      const turn = await registry.reply(req.params.id, text);
      res.json(turn);
    } catch (err) {
      handleError(res, err, 'handling onboarding message', req.params.id);
    }
  });

  // GET /api/onboarding/:id: current state and collected slots
  router.get('/:id', (req, res) => {
    try {
      const session = registry.get(req.params.id);
      res.json({
        sessionId: session.id,
        state: session.state,
        done: session.done,
        visited: session.visited,
        slots: session.snapshot(),
        recommendation: session.recommendation,
        configuration: session.configuration,
      });
    } catch (err) {
      handleError(res, err, 'fetching onboarding session', req.params.id);
    }
  });

  // DELETE /api/onboarding/:id: discard a session
  router.delete('/:id', (req, res) => {
    try {
      registry.delete(req.params.id);
      res.status(204).end();
    } catch (err) {
      handleError(res, err, 'deleting onboarding session', req.params.id);
    }
  });

  return router;
}
