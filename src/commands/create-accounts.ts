/**
 * @module commands/create-accounts
 * Implémente la commande `sa-maker create-accounts --name <préfixe> --amount <n>`.
 */

import { InvalidArgumentError } from 'commander';
import type { CommandContext } from './runner.js';
import { ProvisioningService } from '../services/provisioning-service.js';

export interface CreateAccountsOptions {
  name: string;
  amount: number;
}

/**
 * Parseur commander pour `--amount` : entier ≥ 1.
 */
export function parseAmount(value: string): number {
  const amount = Number(value);
  if (!Number.isInteger(amount) || amount < 1) {
    throw new InvalidArgumentError('Doit être un entier supérieur ou égal à 1.');
  }
  return amount;
}

export async function createAccountsCommand(ctx: CommandContext, options: CreateAccountsOptions): Promise<void> {
  const { api, config, logger } = ctx;
  const service = new ProvisioningService(api, logger);

  const report = await service.provisionAccounts({
    prefix: options.name,
    amount: options.amount,
    folder: config.serviceAccountFolder,
  });

  const last = report.start + report.created.length - 1;
  logger.success(
    `${report.created.length} service account(s) créé(s) (n°${report.start} à ${last}), clés dans ${report.directory}`,
  );
}
