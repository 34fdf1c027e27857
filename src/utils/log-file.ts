/**
 * @module utils/log-file
 * Fichier de log tournant : le fichier courant est archivé après 30 jours
 * (`activity.<début>.log`) et les archives sont supprimées 7 jours après leur
 * dernière écriture.
 */

import fs from "fs-extra";
import * as path from "path";
import { describeError } from "./errors.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export const LOG_ROTATION_MS = 30 * DAY_MS;
export const LOG_RETENTION_MS = 7 * DAY_MS;

// longueur d’un timestamp ISO en tête de ligne : 2026-10-19T12:00:00.000Z
const TIMESTAMP_LENGTH = 24;

export interface LogFileOptions {
  rotationMs?: number;
  retentionMs?: number;
  now?: () => number;
  /** Appelé une seule fois, au premier échec d’écriture ; le fichier est ensuite ignoré. */
  onError?: (message: string) => void;
}

export class LogFile {
  private readonly rotationMs: number;
  private readonly retentionMs: number;
  private readonly now: () => number;
  private readonly onError?: (message: string) => void;
  private startedAt?: number;
  private disabled = false;

  constructor(public readonly filePath: string, options: LogFileOptions = {}) {
    this.rotationMs  = options.rotationMs ?? LOG_ROTATION_MS;
    this.retentionMs = options.retentionMs ?? LOG_RETENTION_MS;
    this.now         = options.now ?? Date.now;
    this.onError     = options.onError;
    this.open();
  }

  public write(line: string): void {
    if (this.disabled) return;
    try {
      const now = this.now();
      if (this.startedAt !== undefined && now - this.startedAt >= this.rotationMs) {
        this.rotate();
      }
      fs.appendFileSync(this.filePath, line, "utf8");
      if (this.startedAt === undefined) {
        this.startedAt = now;
      }
    } catch (error) {
      this.fail(error);
    }
  }

  /**
   * Nom d’archive d’un fichier commencé à `startedAt`.
   */
  public archivePath(startedAt: number): string {
    const { dir, name, ext } = path.parse(this.filePath);
    const stamp = new Date(startedAt).toISOString().replace(/[:.]/g, "-");
    return path.join(dir, `${name}.${stamp}${ext}`);
  }

  private open(): void {
    try {
      fs.ensureDirSync(path.dirname(this.filePath));
      this.startedAt = this.readStart();
      if (this.startedAt !== undefined && this.now() - this.startedAt >= this.rotationMs) {
        this.rotate();
      }
      this.purge();
    } catch (error) {
      this.fail(error);
    }
  }

  /** Début du fichier courant : timestamp de sa première ligne, sinon sa date de modification. */
  private readStart(): number | undefined {
    if (!fs.existsSync(this.filePath)) return undefined;
    const fd = fs.openSync(this.filePath, "r");
    try {
      const buffer = Buffer.alloc(TIMESTAMP_LENGTH);
      const read = fs.readSync(fd, buffer, 0, TIMESTAMP_LENGTH, 0);
      const stamp = Date.parse(buffer.toString("utf8", 0, read));
      return Number.isNaN(stamp) ? fs.statSync(this.filePath).mtimeMs : stamp;
    } finally {
      fs.closeSync(fd);
    }
  }

  private rotate(): void {
    if (this.startedAt === undefined) return;
    fs.renameSync(this.filePath, this.archivePath(this.startedAt));
    this.startedAt = undefined;
  }

  private purge(): void {
    const { dir, name, ext } = path.parse(this.filePath);
    const archive = new RegExp(`^${escapeRegExp(name)}\\.\\d{4}-\\d{2}-\\d{2}T[\\d-]+Z${escapeRegExp(ext)}$`);
    const now = this.now();
    for (const entry of fs.readdirSync(dir)) {
      if (!archive.test(entry)) continue;
      const archivePath = path.join(dir, entry);
      if (now - fs.statSync(archivePath).mtimeMs > this.retentionMs) {
        fs.removeSync(archivePath);
      }
    }
  }

  private fail(error: unknown): void {
    this.disabled = true;
    this.onError?.(
      `Écriture impossible dans ${this.filePath} : ${describeError(error)}. Les logs ne sont plus affichés que dans le terminal.`,
    );
  }
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
