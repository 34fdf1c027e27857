/**
 * @module utils/logger
 * Logger du CLI : affichage coloré (chalk) dans le terminal et copie en texte brut
 * dans le fichier de log.
 */

import chalk from "chalk";
import { describeError, MakerError } from "./errors.js";
import { LogFile } from "./log-file.js";

export enum LogLevel {
  INFO = 0,
  DEBUG = 1,
  TRACE = 2,
}

export const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.INFO]: "INFO",
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.TRACE]: "TRACE",
};

/**
 * Destination console, remplaçable dans les tests.
 */
export interface LogSink {
  log(line: string): void;
  error(line: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Fichier de log (tournant) ; rien n’est écrit sur disque s’il est absent. */
  logPath?: string;
  sink?: LogSink;
  /** Horloge des timestamps et de la rotation du fichier. */
  now?: () => number;
}

/**
 * Niveau correspondant au nombre de `-v` passés au CLI.
 */
export function levelFromVerbosity(verbose: number): LogLevel {
  if (verbose <= 0) return LogLevel.INFO;
  if (verbose === 1) return LogLevel.DEBUG;
  return LogLevel.TRACE;
}

export class Logger {
  public readonly level: LogLevel;
  private readonly sink: LogSink;
  private readonly now: () => number;
  private readonly file?: LogFile;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.now = options.now ?? Date.now;
    this.sink = options.sink ?? {
      log: (line) => console.log(line),
      error: (line) => console.error(line),
    };
    if (options.logPath) {
      // un fichier inutilisable ne bloque pas la commande : avertissement puis terminal seul
      this.file = new LogFile(options.logPath, {
        now: this.now,
        onError: (message) => this.sink.error(chalk.yellow(`⚠ ${message}`)),
      });
    }
  }

  info(message: string): void {
    this.emit("INFO", message, message);
  }

  success(message: string): void {
    this.emit("INFO", message, chalk.green(`✅ ${message}`));
  }

  warn(message: string): void {
    this.emit("WARN", message, chalk.yellow(`⚠ ${message}`));
  }

  debug(message: string): void {
    if (this.level < LogLevel.DEBUG) return;
    this.emit("DEBUG", message, chalk.gray(message));
  }

  trace(message: string): void {
    if (this.level < LogLevel.TRACE) return;
    this.emit("TRACE", message, chalk.dim(message));
  }

  /**
   * Affiche le message puis, si présents, les détails de l’erreur (payload brut compris).
   * La pile n’est affichée qu’en TRACE.
   */
  error(message: string, error?: unknown): void {
    const lines = [message];
    if (error !== undefined) {
      lines.push(describeError(error));
      // détails de chaque erreur de la chaîne, payload brut de l’API compris
      let current: unknown = error;
      while (current instanceof MakerError) {
        if (current.details && Object.keys(current.details).length > 0) {
          lines.push(JSON.stringify(current.details, null, 2));
        }
        current = current.cause;
      }
      if (this.level >= LogLevel.TRACE && error instanceof Error && error.stack) {
        lines.push(error.stack);
      }
    }
    const text = lines.join("\n");
    this.emit("ERROR", text, chalk.red(`✖ ${text}`), true);
  }

  private emit(label: string, plain: string, colored: string, toStderr = false): void {
    if (toStderr) {
      this.sink.error(colored);
    } else {
      this.sink.log(colored);
    }
    this.file?.write(`${new Date(this.now()).toISOString()} | ${label.padEnd(5)} | ${plain}\n`);
  }
}
