// Arquivo: core/logger.ts

import { MAX_LOG_ENTRIES } from '../constants';

export type LogType = 'INFO' | 'SUCCESS' | 'WARNING' | 'ERROR';

export interface LogEntry {
  timestamp: number;
  tag: string;
  message: string;
  type: LogType;
}

export interface ClaimLoggerOptions {
  maxEntries?: number;
  /** Espelha cada entrada no console (padrão: true). */
  echo?: boolean;
  now?: () => number;
}

const formatClock = (ts: number) => new Date(ts).toISOString().slice(11, 19);
const formatStamp = (ts: number) => new Date(ts).toISOString().slice(0, 19).replace('T', ' ');

/**
 * Log de campo da conquista. Mantém as últimas entradas em memória para o painel
 * de debug e repete tudo no console no formato "[TAG] mensagem".
 */
export class ClaimLogger {
  private readonly maxEntries: number;
  private readonly echo: boolean;
  private readonly now: () => number;
  private buffer: LogEntry[] = [];

  constructor(options: ClaimLoggerOptions = {}) {
    this.maxEntries = options.maxEntries ?? MAX_LOG_ENTRIES;
    this.echo = options.echo ?? true;
    this.now = options.now ?? Date.now;
  }

  get entries(): readonly LogEntry[] {
    return this.buffer;
  }

  log(tag: string, message: string, type: LogType = 'INFO', data?: Record<string, unknown>): void {
    const entry: LogEntry = { timestamp: this.now(), tag, message, type };
    this.buffer.push(entry);
    if (this.buffer.length > this.maxEntries) {
      this.buffer.shift();
    }

    if (!this.echo) return;
    const line = `[${tag}] ${message}`;
    const args: unknown[] = data ? [line, data] : [line];
    if (type === 'ERROR') console.error(...args);
    else if (type === 'WARNING') console.warn(...args);
    else console.log(...args);
  }

  info(tag: string, message: string, data?: Record<string, unknown>) {
    this.log(tag, message, 'INFO', data);
  }

  success(tag: string, message: string, data?: Record<string, unknown>) {
    this.log(tag, message, 'SUCCESS', data);
  }

  warn(tag: string, message: string, data?: Record<string, unknown>) {
    this.log(tag, message, 'WARNING', data);
  }

  error(tag: string, message: string, data?: Record<string, unknown>) {
    this.log(tag, message, 'ERROR', data);
  }

  clear(): void {
    this.buffer = [];
  }

  /** Texto da tela de log (HH:mm:ss, UTC). */
  toText(): string {
    return this.buffer
      .map(e => `[${formatClock(e.timestamp)}] [${e.type}] [${e.tag}] ${e.message}\n`)
      .join('');
  }

  /** Exportação completa com cabeçalho, para anexar em relatórios de teste de campo. */
  export(): string {
    const header =
      `=== CLAIM FIELD LOG ===\n` +
      `Exported: ${formatStamp(this.now())}\n` +
      `Entries: ${this.buffer.length}\n\n`;
    const body = this.buffer
      .map(e => `[${formatStamp(e.timestamp)}] [${e.type}] [${e.tag}] ${e.message}\n`)
      .join('');
    return header + body;
  }
}

export const createSilentLogger = (now?: () => number) => new ClaimLogger({ echo: false, now });
