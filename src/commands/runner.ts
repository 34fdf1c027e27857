/**
 * @module commands/runner
 * Prépare les dépendances d’une commande (config, logger, token, client Google)
 * et traduit toute erreur en message + code de sortie 1.
 */

import type { Command } from 'commander';
import { AuthService } from '../services/auth-service.js';
import { ConfigService, resolveRuntimePaths } from '../services/config-service.js';
import { CredentialStore } from '../services/credential-store.js';
import { GoogleApiService } from '../services/google-api-service.js';
import type { MakerConfig, RuntimePaths } from '../types/cli-config.js';
import type { CloudApiClient } from '../types/google.js';
import {
  ApiError,
  AuthExchangeError,
  AuthRequiredError,
  ConfigError,
  FilesystemError,
  ProvisioningAbortedError,
  ShareAbortedError,
  ValidationError,
} from '../utils/errors.js';
import { LOG_LEVEL_NAMES, Logger, levelFromVerbosity } from '../utils/logger.js';

export interface GlobalOptions extends Partial<RuntimePaths> {
  verbose: number;
}

export interface CommandContext {
  paths: RuntimePaths;
  config: MakerConfig;
  logger: Logger;
  store: CredentialStore;
  auth: AuthService;
  api: CloudApiClient;
}

/**
 * Options globales (program) vues depuis une sous-commande.
 */
export function globalOptions(command: Command): GlobalOptions {
  const opts = command.optsWithGlobals();
  return {
    verbose:    typeof opts.verbose === 'number' ? opts.verbose : 0,
    configPath: typeof opts.configPath === 'string' ? opts.configPath : undefined,
    logPath:    typeof opts.logPath === 'string' ? opts.logPath : undefined,
    tokenPath:  typeof opts.tokenPath === 'string' ? opts.tokenPath : undefined,
  };
}

/**
 * Construit le contexte à partir de la config chargée. Aucune variable globale :
 * chaque service reçoit explicitement ce dont il a besoin.
 */
export async function createContext(paths: RuntimePaths, logger: Logger): Promise<CommandContext> {
  const config = await new ConfigService(paths.configPath).getConfig();
  const store  = new CredentialStore(paths.tokenPath);
  const auth   = new AuthService(config, store, { logger });
  const api    = new GoogleApiService(auth, {
    projectName:   config.projectName,
    teamDriveRole: config.teamDriveRole,
    logger,
  });
  return { paths, config, logger, store, auth, api };
}

/**
 * Titre affiché avant le détail d’une erreur.
 */
export function errorHeadline(error: unknown): string {
  if (error instanceof ConfigError) return 'Configuration invalide.';
  if (error instanceof AuthExchangeError) return 'Autorisation refusée : relancez `sa-maker authorize`.';
  if (error instanceof AuthRequiredError) return 'Authentification requise.';
  if (error instanceof ProvisioningAbortedError) return 'Création des service accounts interrompue.';
  if (error instanceof ShareAbortedError) return 'Partage de la team drive interrompu.';
  if (error instanceof ValidationError) return 'Données invalides.';
  if (error instanceof ApiError) return 'Erreur de l’API Google.';
  if (error instanceof FilesystemError) return 'Erreur d’accès aux fichiers.';
  return 'Erreur inattendue.';
}

/**
 * Exécute une commande : toute erreur est affichée (payload brut compris) et
 * le processus se termine avec le code 1.
 */
export async function runCommand(
  options: GlobalOptions,
  action: (ctx: CommandContext) => Promise<void>,
): Promise<void> {
  const paths  = resolveRuntimePaths(options);
  const level  = levelFromVerbosity(options.verbose);
  const logger = new Logger({ level, logPath: paths.logPath });

  logger.debug(`${'CONFIG_PATH'.padEnd(12)} = ${paths.configPath}`);
  logger.debug(`${'TOKEN_PATH'.padEnd(12)} = ${paths.tokenPath}`);
  logger.info(`${'LOG_PATH'.padEnd(12)} = ${paths.logPath}`);
  logger.info(`${'LOG_LEVEL'.padEnd(12)} = ${LOG_LEVEL_NAMES[level]}`);

  try {
    const ctx = await createContext(paths, logger);
    await action(ctx);
  } catch (error) {
    logger.error(errorHeadline(error), error);
    process.exitCode = 1;
  }
}
