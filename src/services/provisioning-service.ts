/**
 * @module services/provisioning-service
 * Création en masse de service accounts numérotés et de leurs clés.
 *
 * Les comptes sont créés un par un, dans l’ordre croissant des numéros. Le premier
 * échec interrompt le lot : les comptes et clés déjà créés restent en place, et la
 * prochaine exécution reprend après la dernière clé présente dans le dossier.
 */

import fs from 'fs-extra';
import * as path from 'path';
import { ACCOUNT_NUMBER_DIGITS } from '../config/cli-config.js';
import type { CloudApiClient, ServiceAccount } from '../types/google.js';
import {
  FilesystemError,
  ProvisioningAbortedError,
  ValidationError,
  describeError,
  faultToError,
} from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { keyFileName, writeServiceKey } from '../utils/service-key-utils.js';
import { resolveStart } from './account-numbering-service.js';

// contraintes IAM sur l’identifiant d’un service account
const ACCOUNT_ID_PATTERN = /^[a-z]([-a-z0-9]*[a-z0-9])$/;
const ACCOUNT_ID_MIN_LENGTH = 6;
const ACCOUNT_ID_MAX_LENGTH = 30;

export interface ProvisioningRequest {
  /** Préfixe des comptes, aussi nom du sous-dossier des clés. */
  prefix: string;
  amount: number;
  /** Dossier racine des clés (service_account_folder). */
  folder: string;
}

export interface ProvisionedAccount {
  accountNumber: number;
  accountId: string;
  email: string;
  keyPath: string;
}

export interface ProvisioningReport {
  directory: string;
  start: number;
  created: ProvisionedAccount[];
}

/**
 * `prefix` suivi du numéro sur 6 chiffres : `svc` + 3 → `svc000003`.
 */
export function formatAccountId(prefix: string, accountNumber: number): string {
  return `${prefix}${String(accountNumber).padStart(ACCOUNT_NUMBER_DIGITS, '0')}`;
}

/**
 * Vérifie qu’un identifiant généré à partir du préfixe sera accepté par IAM.
 * @throws ValidationError sinon.
 */
export function validateAccountPrefix(prefix: string): void {
  const sample = formatAccountId(prefix, 0);
  if (sample.length < ACCOUNT_ID_MIN_LENGTH || sample.length > ACCOUNT_ID_MAX_LENGTH || !ACCOUNT_ID_PATTERN.test(sample)) {
    throw new ValidationError(
      `Préfixe invalide "${prefix}" : les identifiants générés (ex. ${sample}) doivent faire ` +
      `${ACCOUNT_ID_MIN_LENGTH} à ${ACCOUNT_ID_MAX_LENGTH} caractères, commencer par une lettre minuscule ` +
      `et ne contenir que [a-z0-9-].`,
    );
  }
}

export class ProvisioningService {
  constructor(
    private readonly api: CloudApiClient,
    private readonly logger: Logger,
  ) {}

  /**
   * Crée `amount` comptes à partir du prochain numéro libre du dossier `folder/prefix`,
   * chacun avec sa clé écrite dans `{numéro}.json`.
   *
   * @throws ValidationError si la demande est invalide (aucun appel n’est alors fait).
   * @throws FilesystemError si le dossier ne peut pas être préparé ou lu.
   * @throws ProvisioningAbortedError au premier échec en cours de lot.
   */
  public async provisionAccounts(request: ProvisioningRequest): Promise<ProvisioningReport> {
    const { prefix, amount, folder } = request;
    if (!Number.isInteger(amount) || amount < 1) {
      throw new ValidationError(`Nombre de comptes invalide : ${amount} (minimum 1).`);
    }
    validateAccountPrefix(prefix);

    const directory = path.join(folder, prefix);
    try {
      await fs.ensureDir(directory);
    } catch (error) {
      throw new FilesystemError(`Impossible de créer le dossier de clés ${directory} : ${describeError(error)}`, {
        cause: error,
        details: { directory },
      });
    }
    this.logger.debug(`Dossier des clés : ${directory}`);

    const start = await resolveStart(directory);
    this.logger.info(`Création de ${amount} service account(s) à partir du numéro ${start}…`);

    const created: ProvisionedAccount[] = [];
    for (let accountNumber = start; accountNumber < start + amount; accountNumber++) {
      try {
        created.push(await this.provisionOne(prefix, accountNumber, directory));
      } catch (error) {
        throw new ProvisioningAbortedError(
          `Création interrompue au compte n°${accountNumber} : ${describeError(error)}`,
          accountNumber,
          created.map((account) => account.email),
          error,
        );
      }
    }
    return { directory, start, created };
  }

  private async provisionOne(prefix: string, accountNumber: number, directory: string): Promise<ProvisionedAccount> {
    const accountId = formatAccountId(prefix, accountNumber);

    const accountResult = await this.api.createServiceAccount(accountId);
    if (!accountResult.ok) {
      throw faultToError(`Échec de la création du service account ${accountId}`, accountResult.error);
    }
    const account: ServiceAccount = accountResult.value;
    this.logger.info(`Service account créé : ${account.email}`);

    const keyResult = await this.api.createServiceAccountKey(account.email);
    if (!keyResult.ok) {
      throw faultToError(`Échec de la création de la clé de ${account.email}`, keyResult.error);
    }

    const keyPath = path.join(directory, keyFileName(accountNumber));
    await writeServiceKey(keyPath, keyResult.value);
    this.logger.success(`Clé de ${account.email} enregistrée : ${keyPath}`);

    return { accountNumber, accountId, email: account.email, keyPath };
  }
}
