import { describe, it, expect, vi, afterEach } from 'vitest';
import { RosterCache } from './rosterCache';
import { createSilentLogger } from '../core/logger';
import { TerritoryOutline } from '../types';
import { squareTerritory } from '../test/helpers';

describe('RosterCache', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('começa vazio e obsoleto', () => {
    const cache = new RosterCache(async () => [], 30000, createSilentLogger());
    expect(cache.getRoster()).toEqual([]);
    expect(cache.isStale()).toBe(true);
  });

  it('substitui o roster a cada atualização', async () => {
    const rival = squareTerritory('rival', 0, 0);
    const cache = new RosterCache(async () => [rival], 30000, createSilentLogger(), () => 5000);

    expect(await cache.refresh()).toBe(true);
    expect(cache.getRoster()).toEqual([rival]);
    expect(cache.refreshedAt).toBe(5000);
    expect(cache.isStale()).toBe(false);
  });

  it('mantém a cópia anterior quando a atualização falha', async () => {
    const rival = squareTerritory('rival', 0, 0);
    const loader = vi
      .fn<[], Promise<TerritoryOutline[]>>()
      .mockResolvedValueOnce([rival])
      .mockRejectedValueOnce(new Error('offline'));
    const logger = createSilentLogger();
    const cache = new RosterCache(loader, 30000, logger);

    await cache.refresh();
    expect(await cache.refresh()).toBe(false);

    expect(cache.getRoster()).toEqual([rival]);
    expect(logger.entries[logger.entries.length - 1].message).toBe(
      'Falha ao atualizar territórios, mantendo cópia anterior: offline'
    );
  });

  it('compartilha a mesma atualização em andamento', async () => {
    const loader = vi.fn(async (): Promise<TerritoryOutline[]> => []);
    const cache = new RosterCache(loader, 30000, createSilentLogger());

    await Promise.all([cache.refresh(), cache.refresh()]);

    expect(loader).toHaveBeenCalledTimes(1);
  });

  it('consulta a cada intervalo enquanto o polling estiver ativo', async () => {
    vi.useFakeTimers();
    const loader = vi.fn(async (): Promise<TerritoryOutline[]> => []);
    const cache = new RosterCache(loader, 30000, createSilentLogger());

    cache.startPolling();
    await vi.advanceTimersByTimeAsync(60000);
    cache.stopPolling();
    await vi.advanceTimersByTimeAsync(60000);

    expect(loader).toHaveBeenCalledTimes(3);
  });
});
