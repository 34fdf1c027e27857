/**
 * @module commands/list-accounts
 * Implémente la commande `sa-maker list-accounts`.
 */

import type { CommandContext } from './runner.js';
import { faultToError } from '../utils/errors.js';

export async function listAccountsCommand(ctx: CommandContext): Promise<void> {
  const { api, logger } = ctx;
  logger.info('Récupération des service accounts existants…');

  const result = await api.listServiceAccounts();
  if (!result.ok) {
    throw faultToError('Impossible de récupérer les service accounts', result.error);
  }
  logger.info(`Service accounts existants (${result.value.length}) :\n${JSON.stringify(result.value, null, 2)}`);
}
