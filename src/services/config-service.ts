/**
 * @module services/config-service
 * Gère la lecture de config.json et la résolution des chemins d’exécution.
 */

import fs from 'fs-extra';
import * as path from 'path';
import type { MakerConfig, RawMakerConfig, RuntimePaths } from '../types/cli-config.js';
import {
  DEFAULT_CONFIG_FILE,
  DEFAULT_LOG_FILE,
  DEFAULT_REDIRECT_URI,
  DEFAULT_TEAMDRIVE_ROLE,
  DEFAULT_TOKEN_FILE,
  defaultMakerConfig,
} from '../config/cli-config.js';
import { ConfigError, describeError } from '../utils/errors.js';
import { isRecord, readString } from '../utils/json-utils.js';

const REQUIRED_KEYS: (keyof RawMakerConfig)[] = ['client_id', 'client_secret', 'project_name', 'service_account_folder'];

/**
 * Résout les chemins passés en option : les chemins relatifs partent du dossier courant.
 */
export function resolveRuntimePaths(
  options: Partial<RuntimePaths>,
  baseDir: string = process.cwd(),
): RuntimePaths {
  return {
    configPath: path.resolve(baseDir, options.configPath ?? DEFAULT_CONFIG_FILE),
    logPath:    path.resolve(baseDir, options.logPath ?? DEFAULT_LOG_FILE),
    tokenPath:  path.resolve(baseDir, options.tokenPath ?? DEFAULT_TOKEN_FILE),
  };
}

export class ConfigService {
  constructor(private readonly configPath: string) {}

  /**
   * Lit et vérifie la config.
   * Si le fichier n’existe pas, un modèle est écrit à sa place avant de lever une `ConfigError`.
   * @throws ConfigError si le fichier est absent, illisible ou incomplet.
   */
  public async getConfig(): Promise<MakerConfig> {
    if (!(await fs.pathExists(this.configPath))) {
      await fs.ensureDir(path.dirname(this.configPath));
      await fs.writeJSON(this.configPath, defaultMakerConfig, { spaces: 2 });
      throw new ConfigError(
        `Aucune configuration trouvée : un modèle a été créé dans ${this.configPath}, complétez-le puis relancez.`,
        { details: { configPath: this.configPath } },
      );
    }

    let raw: unknown;
    try {
      raw = await fs.readJSON(this.configPath);
    } catch (error) {
      throw new ConfigError(`Configuration illisible (${this.configPath}) : ${describeError(error)}`, {
        cause: error,
        details: { configPath: this.configPath },
      });
    }
    if (!isRecord(raw)) {
      throw new ConfigError(`La configuration ${this.configPath} doit être un objet JSON.`);
    }
    const data = raw;

    const missing = REQUIRED_KEYS.filter((key) => !isFilled(data[key]));
    if (missing.length > 0) {
      throw new ConfigError(`Clés manquantes dans ${this.configPath} : ${missing.join(', ')}`, {
        details: { configPath: this.configPath, missing },
      });
    }

    return {
      clientId:             readField(data, 'client_id'),
      clientSecret:         readField(data, 'client_secret'),
      projectName:          readField(data, 'project_name'),
      serviceAccountFolder: path.resolve(path.dirname(this.configPath), readField(data, 'service_account_folder')),
      redirectUri:          readField(data, 'redirect_uri', DEFAULT_REDIRECT_URI),
      teamDriveRole:        readField(data, 'teamdrive_role', DEFAULT_TEAMDRIVE_ROLE),
    };
  }
}

function isFilled(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

function readField(raw: Record<string, unknown>, key: keyof RawMakerConfig, fallback = ''): string {
  const value = readString(raw, key);
  return value !== undefined && isFilled(value) ? value.trim() : fallback;
}
