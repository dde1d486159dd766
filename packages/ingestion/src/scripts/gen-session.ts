import { createInterface } from 'readline/promises';
import { TelegramClient } from 'telegram';
import { StringSession } from 'telegram/sessions';
import { loadDotenv } from '../config/env';
import { FATAL_ERROR_EXIT_CODE } from '../core/errors';
import { logger } from '../core/logger';

async function main() {
  loadDotenv();
  // Prompts go to stderr so the session line is the only thing on stdout.
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  const ask = (question: string) => rl.question(question);

  try {
    const apiId = Number(process.env.TELEGRAM_API_ID || (await ask('Enter your TELEGRAM_API_ID: ')));
    const apiHash = process.env.TELEGRAM_API_HASH || (await ask('Enter your TELEGRAM_API_HASH: '));
    if (!Number.isSafeInteger(apiId) || apiId <= 0 || !apiHash) {
      throw new Error('TELEGRAM_API_ID must be a positive integer and TELEGRAM_API_HASH must be set');
    }

    logger.info('Logging in to Telegram...');
    const session = new StringSession('');
    const client = new TelegramClient(session, apiId, apiHash, { connectionRetries: 5 });
    try {
      await client.start({
        phoneNumber: () => ask('Phone number (international format): '),
        password: () => ask('Two-factor password (if enabled): '),
        phoneCode: () => ask('Login code: '),
        onError: (error) => logger.error('Login error', { error }),
      });
      logger.info('Successfully logged in! Keep this string private: anyone with it can access your account.');
      process.stdout.write(`TELEGRAM_STRING_SESSION=${session.save()}\n`);
    } finally {
      await client.destroy();
    }
  } finally {
    rl.close();
  }
}

main().catch((error: unknown) => {
  logger.error('gen-session failed', { error });
  process.exit(FATAL_ERROR_EXIT_CODE);
});
