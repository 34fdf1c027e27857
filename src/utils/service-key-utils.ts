import fs from "fs-extra";
import * as path from "path";
import type { ServiceAccountKey } from "../types/google.js";
import { FilesystemError, ValidationError, describeError } from "./errors.js";
import { isRecord, readString } from "./json-utils.js";

// projects/<projet>/serviceAccounts/<email>/keys/<id>
const KEY_NAME_PATTERN = /\/serviceAccounts\/([^/]+)\/keys\//;

/**
 * Retrouve l’email du service account d’une clé :
 * `client_email` du fichier de credentials encodé dans `privateKeyData`,
 * sinon l’email présent dans le nom de ressource de la clé.
 */
export function getServiceKeyEmail(key: unknown): string | undefined {
  if (!isRecord(key)) return undefined;

  const privateKeyData = readString(key, "privateKeyData");
  if (privateKeyData) {
    try {
      const decoded: unknown = JSON.parse(Buffer.from(privateKeyData, "base64").toString("utf8"));
      const email = isRecord(decoded) ? readString(decoded, "client_email") : undefined;
      if (email) return email;
    } catch {
      // contenu non JSON : on se rabat sur le nom de la clé
    }
  }

  const name = readString(key, "name");
  const match = name ? KEY_NAME_PATTERN.exec(name) : null;
  const email = match ? decodeURIComponent(match[1]) : undefined;
  return email?.includes("@") ? email : undefined;
}

const KEY_FILE_PATTERN = /^(\d+)\.json$/;

/**
 * Numéro porté par un nom de fichier de clé (`12.json` → 12), ou `undefined` si le nom
 * ne suit pas ce format.
 */
export function parseKeyFileNumber(fileName: string): number | undefined {
  const match = KEY_FILE_PATTERN.exec(fileName);
  if (!match) return undefined;
  const value = Number.parseInt(match[1], 10);
  return Number.isSafeInteger(value) ? value : undefined;
}

/**
 * Nom du fichier de clé d’un numéro de compte.
 */
export function keyFileName(accountNumber: number): string {
  return `${accountNumber}.json`;
}

/**
 * Écrit la clé telle quelle (JSON indenté). N’écrase jamais un fichier existant.
 * @throws FilesystemError si l’écriture échoue.
 */
export async function writeServiceKey(filePath: string, key: ServiceAccountKey): Promise<void> {
  try {
    await fs.writeJSON(filePath, key, { spaces: 2, flag: "wx" });
  } catch (error) {
    throw new FilesystemError(`Impossible d’écrire la clé ${filePath} : ${describeError(error)}`, {
      cause: error,
      details: { filePath },
    });
  }
}

/**
 * Liste les emails des service accounts dont les clés (`{n}.json`) sont dans `folder`,
 * dans l’ordre numérique des fichiers, sans doublon. Les autres fichiers sont ignorés.
 *
 * @throws FilesystemError si le dossier ou une clé est illisible.
 * @throws ValidationError si une clé ne permet pas de retrouver son email.
 */
export async function getServiceAccountUsers(folder: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(folder);
  } catch (error) {
    throw new FilesystemError(`Impossible de lire le dossier de clés ${folder} : ${describeError(error)}`, {
      cause: error,
      details: { folder },
    });
  }

  // mêmes fichiers que ceux comptés par la numérotation : `{n}.json` uniquement
  const files = entries
    .map((entry) => ({ entry, accountNumber: parseKeyFileNumber(entry) }))
    .filter((file): file is { entry: string; accountNumber: number } => file.accountNumber !== undefined)
    .sort((a, b) => a.accountNumber - b.accountNumber)
    .map((file) => file.entry);

  const users: string[] = [];
  for (const file of files) {
    const filePath = path.join(folder, file);
    let key: unknown;
    try {
      key = await fs.readJSON(filePath);
    } catch (error) {
      throw new FilesystemError(`Clé illisible ${filePath} : ${describeError(error)}`, {
        cause: error,
        details: { filePath },
      });
    }
    const email = getServiceKeyEmail(key);
    if (!email) {
      throw new ValidationError(`Impossible de déterminer le service account de la clé ${filePath}`);
    }
    if (!users.includes(email)) {
      users.push(email);
    }
  }
  return users;
}
