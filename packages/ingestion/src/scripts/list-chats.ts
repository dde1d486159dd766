import { parseArgs } from 'util';
import { getPeerId } from 'telegram/Utils';
import { loadClientConfig, loadDotenv, type ClientConfig } from '../config/env';
import { CONFIG_ERROR_EXIT_CODE, ConfigError, FATAL_ERROR_EXIT_CODE } from '../core/errors';
import { logger } from '../core/logger';
import { connectAuthorized, createTelegramClient } from '../telegram/client';
import { describeDialog, formatDialog } from '../telegram/dialogs';

function peerIdOf(entity: Parameters<typeof getPeerId>[0]): number | null {
  try {
    const peerId = Number(getPeerId(entity));
    return Number.isSafeInteger(peerId) ? peerId : null;
  } catch {
    return null;
  }
}

async function main(): Promise<number> {
  loadDotenv();
  const { values } = parseArgs({ options: { json: { type: 'boolean', default: false } } });

  let config: ClientConfig;
  try {
    config = loadClientConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      for (const issue of error.issues) logger.error(`[env] ${issue}`);
      return CONFIG_ERROR_EXIT_CODE;
    }
    throw error;
  }
  logger.setLevel(config.logLevel);

  const client = createTelegramClient({ ...config, logger });
  try {
    await connectAuthorized(client);
    const dialogs = await client.getDialogs({});

    for (const dialog of dialogs) {
      const entity = dialog.entity;
      if (!entity) continue;

      let inputPeer: object | null = null;
      try {
        inputPeer = await client.getInputEntity(entity);
      } catch (error) {
        // Some system entities have no input peer.
        logger.debug('Could not resolve input peer', { error });
      }

      const summary = describeDialog(entity, peerIdOf(entity), inputPeer);
      const lines = values.json ? [JSON.stringify(summary)] : formatDialog(summary);
      process.stdout.write(`${lines.join('\n')}\n`);
    }
    return 0;
  } finally {
    await client.destroy();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    logger.error('list-chats failed', { error });
    process.exit(FATAL_ERROR_EXIT_CODE);
  });
