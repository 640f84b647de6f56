import { describe, it, expect } from 'vitest';
import { parseStoredPath, toStoredPath, toTerritory } from './territoryRepository';

describe('parseStoredPath', () => {
  it('lê pares lat/lon e descarta entradas malformadas', () => {
    expect(parseStoredPath([{ lat: 1, lon: 2 }, { lat: 'x', lon: 3 }, null, { lat: 4, lon: 5 }])).toEqual([
      { latitude: 1, longitude: 2 },
      { latitude: 4, longitude: 5 }
    ]);
  });

  it('retorna vazio para valores que não são listas', () => {
    expect(parseStoredPath('[]')).toEqual([]);
  });

  it('é o inverso de toStoredPath', () => {
    const coords = [{ latitude: -23.55, longitude: -46.63 }];
    expect(parseStoredPath(toStoredPath(coords))).toEqual(coords);
  });
});

describe('toTerritory', () => {
  it('converte colunas numéricas vindas como texto', () => {
    const territory = toTerritory({
      id: 't_1',
      owner_id: 'user-1',
      path: [{ lat: 0, lon: 0 }, { lat: 0, lon: 1 }, { lat: 1, lon: 1 }],
      area_sqm: '2500.5',
      point_count: null,
      is_active: null,
      bbox_min_lat: '0',
      bbox_max_lat: '1',
      bbox_min_lon: 0,
      bbox_max_lon: 1,
      started_at: '1000',
      completed_at: null,
      created_at: '2000'
    });

    expect(territory).toEqual({
      id: 't_1',
      ownerId: 'user-1',
      polygon: [
        { latitude: 0, longitude: 0 },
        { latitude: 0, longitude: 1 },
        { latitude: 1, longitude: 1 }
      ],
      areaSqm: 2500.5,
      boundingBox: { minLat: 0, maxLat: 1, minLon: 0, maxLon: 1 },
      pointCount: 3,
      isActive: true,
      startedAt: 1000,
      completedAt: null,
      createdAt: 2000
    });
  });
});
