/**
 * @module utils/errors
 * Taxonomie des erreurs du CLI. Chaque erreur conserve sa cause et des détails
 * (payload brut de l’API, chemin, etc.) affichés par le runner de commandes.
 */

import type { ApiFault } from "../types/google.js";

export interface MakerErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export class MakerError extends Error {
  public readonly cause?: unknown;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, options: MakerErrorOptions = {}) {
    super(message);
    this.name = new.target.name;
    this.cause = options.cause;
    this.details = options.details;
  }
}

/** Fichier de configuration absent, illisible ou incomplet. */
export class ConfigError extends MakerError {}

/** Échange du code d’autorisation refusé ou impossible. */
export class AuthExchangeError extends MakerError {}

/** Aucun token utilisable : il faut relancer `authorize`. */
export class AuthRequiredError extends MakerError {}

/** Réponse `ok: false` du client Google. */
export class ApiError extends MakerError {
  public readonly fault?: ApiFault;

  constructor(message: string, fault?: ApiFault, options: MakerErrorOptions = {}) {
    super(message, { ...options, details: { ...options.details, ...faultDetails(fault) } });
    this.fault = fault;
  }
}

/** Réponse bien formée mais incomplète, ou entrée utilisateur invalide. */
export class ValidationError extends ApiError {}

/** Dossier illisible, écriture de clé impossible… */
export class FilesystemError extends MakerError {}

/**
 * Création en masse interrompue : les comptes déjà créés restent en place.
 */
export class ProvisioningAbortedError extends MakerError {
  constructor(
    message: string,
    public readonly failedNumber: number,
    public readonly created: string[],
    cause: unknown,
  ) {
    super(message, { cause, details: { failedNumber, created } });
  }
}

/**
 * Partage interrompu : `granted` ont déjà accès, `pending` n’ont pas été traités.
 */
export class ShareAbortedError extends MakerError {
  constructor(
    message: string,
    public readonly granted: string[],
    public readonly pending: string[],
    cause: unknown,
  ) {
    super(message, { cause, details: { granted, pending } });
  }
}

/**
 * Convertit un `ApiFault` en erreur typée : `validation` → ValidationError, le reste → ApiError.
 */
export function faultToError(message: string, fault: ApiFault): ApiError {
  return fault.kind === "validation"
    ? new ValidationError(message, fault)
    : new ApiError(message, fault);
}

function faultDetails(fault?: ApiFault): Record<string, unknown> {
  if (!fault) return {};
  const details: Record<string, unknown> = { kind: fault.kind, reason: fault.message };
  if (fault.status !== undefined) details.status = fault.status;
  if (fault.payload !== undefined) details.payload = fault.payload;
  return details;
}

/**
 * Message lisible pour une erreur inconnue.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return JSON.stringify(error);
}
