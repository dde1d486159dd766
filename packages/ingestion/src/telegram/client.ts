import { TelegramClient } from 'telegram';
import { Logger as GramLogger, LogLevel as GramLogLevel } from 'telegram/extensions/Logger';
import { StoreSession, StringSession } from 'telegram/sessions';
import { logger as rootLogger, type Logger } from '../core/logger';

export interface TelegramClientOptions {
  apiId: number;
  apiHash: string;
  stringSession: string | null;
  sessionPath: string;
  logger?: Logger;
}

/** Routes gramjs' own console output to the diagnostic logger so stdout stays record-only. */
class DiagnosticGramLogger extends GramLogger {
  constructor(private readonly diagnostics: Logger) {
    super(GramLogLevel.WARN);
  }

  log(level: GramLogLevel, message: string) {
    switch (level) {
      case GramLogLevel.ERROR:
        this.diagnostics.error(message);
        break;
      case GramLogLevel.WARN:
        this.diagnostics.warn(message);
        break;
      case GramLogLevel.INFO:
        this.diagnostics.info(message);
        break;
      default:
        this.diagnostics.debug(message);
    }
  }
}

export function createTelegramClient(options: TelegramClientOptions): TelegramClient {
  const logger = (options.logger ?? rootLogger).child('telegram');
  const session = options.stringSession
    ? new StringSession(options.stringSession)
    : new StoreSession(options.sessionPath);

  return new TelegramClient(session, options.apiId, options.apiHash, {
    connectionRetries: 5,
    baseLogger: new DiagnosticGramLogger(logger),
  });
}

/** Connects and verifies the session is logged in; the scraper never prompts for credentials. */
export async function connectAuthorized(client: TelegramClient): Promise<void> {
  await client.connect();
  if (!(await client.checkAuthorization())) {
    throw new Error('Telegram session is not authorized. Run the gen-session script and set TELEGRAM_STRING_SESSION.');
  }
}
