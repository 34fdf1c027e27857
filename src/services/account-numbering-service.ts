/**
 * @module services/account-numbering-service
 * Détermine le numéro du prochain compte à créer à partir des clés déjà présentes
 * dans le dossier d’un préfixe (`0.json`, `1.json`, …).
 */

import fs from 'fs-extra';
import { ACCOUNT_NUMBER_BASE } from '../config/cli-config.js';
import { FilesystemError, describeError } from '../utils/errors.js';
import { parseKeyFileNumber } from '../utils/service-key-utils.js';

/**
 * Renvoie `max(numéros existants) + 1`, jamais moins que `base`.
 * Les trous laissés par une exécution interrompue ne sont pas comblés.
 * Le dossier est créé s’il n’existe pas.
 *
 * @throws FilesystemError si le dossier existe mais ne peut pas être lu.
 */
export async function resolveStart(directory: string, base: number = ACCOUNT_NUMBER_BASE): Promise<number> {
  if (!(await fs.pathExists(directory))) {
    await fs.ensureDir(directory);
    return base;
  }

  let entries: string[];
  try {
    entries = await fs.readdir(directory);
  } catch (error) {
    throw new FilesystemError(`Impossible de lire le dossier de clés ${directory} : ${describeError(error)}`, {
      cause: error,
      details: { directory },
    });
  }

  let next = base;
  for (const entry of entries) {
    const value = parseKeyFileNumber(entry);
    if (value !== undefined && value + 1 > next) {
      next = value + 1;
    }
  }
  return next;
}
