import { createInterface } from 'readline/promises';
import { config } from './config';
import { createExtractor } from './services/extraction';
import { OnboardingSession } from './onboarding/session';
import { logger } from './utils/logger';
import { errorMessage } from './utils/errors';

async function chat() {
  const session = new OnboardingSession(createExtractor(config.extractor), {
    extractionTimeoutMs: config.extractor.timeoutMs,
    enrichRecommendation: config.extractor.enrichRecommendation,
  });
  const rl = createInterface({ input: process.stdin, output: process.stdout });

  try {
    console.log(`\n${session.start().message}\n`);
    while (!session.done) {
      const text = (await rl.question('> ')).trim();
      if (text === 'exit' || text === 'quit') break;
      const turn = await session.reply(text);
      console.log(`\n${turn.message}\n`);
      if (turn.configuration) {
        console.log(JSON.stringify(turn.configuration, null, 2));
      }
    }
  } finally {
    rl.close();
  }
}

chat().catch((err) => {
  logger.error('Chat session failed', { error: errorMessage(err) });
  process.exit(1);
});
