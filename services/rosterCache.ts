// Arquivo: services/rosterCache.ts

import { ClaimLogger } from '../core/logger';
import { RosterSource } from '../core/session';
import { TerritoryOutline } from '../types';

/**
 * Cópia local dos territórios alheios, atualizada por polling. É uma checagem de
 * cortesia: pode estar desatualizada, e uma falha de rede mantém a última versão.
 */
export class RosterCache implements RosterSource {
  private territories: readonly TerritoryOutline[] = [];
  private lastRefreshAt: number | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<boolean> | null = null;

  constructor(
    private readonly loader: () => Promise<TerritoryOutline[]>,
    private readonly refreshMs: number,
    private readonly logger: ClaimLogger,
    private readonly now: () => number = Date.now
  ) {}

  getRoster(): readonly TerritoryOutline[] {
    return this.territories;
  }

  get refreshedAt(): number | null {
    return this.lastRefreshAt;
  }

  isStale(maxAgeMs: number = this.refreshMs * 2): boolean {
    return this.lastRefreshAt === null || this.now() - this.lastRefreshAt > maxAgeMs;
  }

  /** Substitui o roster (ex.: dados recebidos por outro canal de sync). */
  replace(territories: readonly TerritoryOutline[]): void {
    this.territories = territories;
    this.lastRefreshAt = this.now();
  }

  refresh(): Promise<boolean> {
    // Um refresh por vez
    if (!this.inFlight) {
      this.inFlight = this.load().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  startPolling(): void {
    if (this.timer !== null) return;
    void this.refresh();
    this.timer = setInterval(() => {
      void this.refresh();
    }, this.refreshMs);
  }

  stopPolling(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private async load(): Promise<boolean> {
    try {
      const territories = await this.loader();
      this.replace(territories);
      this.logger.info('ROSTER', `${territories.length} territórios carregados`);
      return true;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error('ROSTER', `Falha ao atualizar territórios, mantendo cópia anterior: ${message}`);
      return false;
    }
  }
}
