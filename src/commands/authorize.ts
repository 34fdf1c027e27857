/**
 * @module commands/authorize
 * Implémente la commande `sa-maker authorize` : affiche l’URL de consentement,
 * attend le code saisi par l’utilisateur puis l’échange contre un token.
 */

import open from 'open';
import prompts from 'prompts';
import type { CommandContext } from './runner.js';
import { AuthExchangeError, describeError } from '../utils/errors.js';

export interface AuthorizeOptions {
  /** Ouvre l’URL dans le navigateur par défaut. */
  open?: boolean;
}

export async function authorizeCommand(ctx: CommandContext, options: AuthorizeOptions = {}): Promise<void> {
  const { auth, config, logger, store } = ctx;
  logger.debug(`client_id: ${config.clientId}`);

  const url = auth.beginAuthorization();
  logger.info('Visitez le lien ci-dessous puis collez le code d’autorisation (ou l’URL de redirection complète) :');
  logger.info(url);

  if (options.open) {
    try {
      await open(url);
    } catch (error) {
      logger.warn(`Impossible d’ouvrir le navigateur : ${describeError(error)}`);
    }
  }

  const resp = await prompts({
    type:    'text',
    name:    'code',
    message: 'Code d’autorisation :',
  });
  const code = typeof resp.code === 'string' ? resp.code : '';
  if (!code.trim()) {
    throw new AuthExchangeError('Aucun code saisi : autorisation annulée.');
  }

  const credential = await auth.exchangeCode(code);
  logger.success(`Code échangé contre un token, enregistré dans ${store.path}`);
  if (credential.expiresAt !== undefined) {
    logger.info(`Token valide jusqu’à ${new Date(credential.expiresAt).toISOString()} (scopes : ${credential.scope ?? 'inconnus'})`);
  }
  if (!credential.refreshToken) {
    logger.warn('Aucun refresh token reçu : il faudra relancer `sa-maker authorize` à l’expiration du token.');
  }
}
