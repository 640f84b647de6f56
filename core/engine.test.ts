import { describe, it, expect, vi } from 'vitest';
import { createClaimEngine } from './engine';
import { createSilentLogger } from './logger';
import { FetchResponse, TerritoryClient } from '../services/territoryClient';
import { SimulatedFixSource } from '../utils/simulator';
import { SessionState } from '../types';
import { squareLoop, squareTerritory, toFixes } from '../test/helpers';

const reply = (status: number, body: unknown): FetchResponse => ({
  ok: status >= 200 && status < 300,
  status,
  json: async () => body
});

const walkSquare = (engine: ReturnType<typeof createClaimEngine>) => {
  engine.session.start();
  toFixes(squareLoop()).forEach(f => engine.session.ingest(f));
  engine.controller.stop();
};

describe('createClaimEngine', () => {
  it('aplica ajustes de configuração', () => {
    const engine = createClaimEngine({
      userId: 'user-1',
      fixSource: new SimulatedFixSource(),
      configOverrides: { closureDistanceThresholdM: 20 },
      logger: createSilentLogger()
    });
    expect(engine.config.closureDistanceThresholdM).toBe(20);
    expect(engine.config.minimumPathPoints).toBe(10);
  });

  it('carrega o roster sem os territórios do próprio usuário', async () => {
    const rival = squareTerritory('rival', 500, 500);
    const fetchImpl = vi.fn(async (_url: string, _init: RequestInit) =>
      reply(200, {
        territories: [{
          id: 't_9',
          ownerId: 'rival',
          polygon: rival.polygon,
          areaSqm: 10000,
          boundingBox: { minLat: 0, maxLat: 0, minLon: 0, maxLon: 0 },
          pointCount: 4,
          isActive: true,
          startedAt: null,
          completedAt: null,
          createdAt: 1
        }]
      })
    );
    const engine = createClaimEngine({
      userId: 'user-1',
      fixSource: new SimulatedFixSource(),
      client: new TerritoryClient({ fetchImpl }),
      logger: createSilentLogger()
    });

    await engine.roster.refresh();

    expect(fetchImpl.mock.calls[0][0]).toBe('/api/territories?exclude=user-1');
    expect(engine.roster.getRoster().map(t => t.ownerId)).toEqual(['rival']);
  });

  it('envia a conquista validada', async () => {
    const fetchImpl = vi.fn(async (_url: string, _init: RequestInit) =>
      reply(201, {
        id: 't_1',
        ownerId: 'user-1',
        polygon: [],
        areaSqm: 2500,
        boundingBox: { minLat: 0, maxLat: 0, minLon: 0, maxLon: 0 },
        pointCount: 16,
        isActive: true,
        startedAt: 0,
        completedAt: 0,
        createdAt: 0
      })
    );
    const engine = createClaimEngine({
      userId: 'user-1',
      fixSource: new SimulatedFixSource(),
      client: new TerritoryClient({ fetchImpl }),
      logger: createSilentLogger()
    });

    walkSquare(engine);
    expect(engine.session.state).toBe(SessionState.VALID);

    const saved = await engine.submitClaim();

    expect(saved?.id).toBe('t_1');
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl.mock.calls[0][1].method).toBe('POST');
    engine.dispose();
  });

  it('não envia nada fora do estado VALID', async () => {
    const fetchImpl = vi.fn(async (_url: string, _init: RequestInit) => reply(200, {}));
    const engine = createClaimEngine({
      userId: 'user-1',
      fixSource: new SimulatedFixSource(),
      client: new TerritoryClient({ fetchImpl }),
      logger: createSilentLogger()
    });

    expect(await engine.submitClaim()).toBeNull();
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('propaga falha de envio', async () => {
    const engine = createClaimEngine({
      userId: 'user-1',
      fixSource: new SimulatedFixSource(),
      client: new TerritoryClient({ fetchImpl: async () => reply(503, { error: 'Indisponível' }) }),
      logger: createSilentLogger()
    });
    walkSquare(engine);

    await expect(engine.submitClaim()).rejects.toThrow('Indisponível');
    expect(engine.logger.entries[engine.logger.entries.length - 1].tag).toBe('UPLOAD');
  });
});
