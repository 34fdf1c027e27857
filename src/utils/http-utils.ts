/**
 * Conversion des erreurs axios en `ApiFault`.
 */

import axios from "axios";
import type { ApiFault } from "../types/google.js";
import { describeError } from "./errors.js";
import { isRecord } from "./json-utils.js";

/**
 * Erreur HTTP (réponse reçue) → `api` ; pas de réponse → `transport`.
 */
export function toApiFault(error: unknown): ApiFault {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      return {
        kind: "api",
        status: error.response.status,
        message: googleErrorMessage(error.response.data) ?? error.message,
        payload: error.response.data,
      };
    }
    return { kind: "transport", message: error.code ? `${error.code}: ${error.message}` : error.message };
  }
  return { kind: "transport", message: describeError(error) };
}

/**
 * Corps de la réponse en erreur, s’il y en a un.
 */
export function responsePayload(error: unknown): unknown {
  return axios.isAxiosError(error) ? error.response?.data : undefined;
}

/**
 * Extrait le message des deux formats d’erreur Google :
 * `{ error: { message } }` (API) et `{ error, error_description }` (OAuth).
 */
export function googleErrorMessage(data: unknown): string | undefined {
  if (!isRecord(data)) return undefined;
  const { error } = data;
  if (isRecord(error) && typeof error.message === "string") {
    return error.message;
  }
  if (typeof error === "string") {
    return typeof data.error_description === "string" ? `${error}: ${data.error_description}` : error;
  }
  return undefined;
}
