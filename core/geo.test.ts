import { describe, it, expect } from 'vitest';
import {
  calculateBoundingBox,
  calculateDistance,
  calculatePathLength,
  closePolygon,
  coordinatesToWkt,
  getBoundingBoxCenter,
  isPointInPolygon,
  segmentsIntersect
} from './geo';
import { at } from '../test/helpers';

describe('calculateDistance', () => {
  it('mede um grau de latitude no equador', () => {
    const d = calculateDistance({ latitude: 0, longitude: 0 }, { latitude: 1, longitude: 0 });
    expect(d).toBeCloseTo(111194.9, 0);
  });

  it('é zero para o mesmo ponto', () => {
    expect(calculateDistance(at(0, 0), at(0, 0))).toBe(0);
  });

  it('concorda com o deslocamento local em metros', () => {
    expect(calculateDistance(at(0, 0), at(30, 40))).toBeCloseTo(50, 1);
  });
});

describe('calculatePathLength', () => {
  it('soma os segmentos sem fechar o polígono', () => {
    const path = [at(0, 0), at(0, 10), at(10, 10)];
    expect(calculatePathLength(path)).toBeCloseTo(20, 3);
  });

  it('é zero com menos de dois pontos', () => {
    expect(calculatePathLength([at(0, 0)])).toBe(0);
  });
});

describe('segmentsIntersect', () => {
  it('detecta cruzamento em X', () => {
    expect(segmentsIntersect(at(0, 0), at(10, 10), at(0, 10), at(10, 0))).toBe(true);
  });

  it('ignora segmentos paralelos', () => {
    expect(segmentsIntersect(at(0, 0), at(0, 10), at(5, 0), at(5, 10))).toBe(false);
  });
});

describe('isPointInPolygon', () => {
  const square = [at(0, 0), at(0, 100), at(100, 100), at(100, 0)];

  it('reconhece ponto interno', () => {
    expect(isPointInPolygon(at(50, 50), square)).toBe(true);
  });

  it('reconhece ponto externo', () => {
    expect(isPointInPolygon(at(150, 50), square)).toBe(false);
  });

  it('retorna false para polígono degenerado', () => {
    expect(isPointInPolygon(at(0, 0), [at(0, 0), at(1, 1)])).toBe(false);
  });
});

describe('bounding box', () => {
  it('cobre todos os pontos', () => {
    const bbox = calculateBoundingBox([
      { latitude: 1, longitude: 5 },
      { latitude: -2, longitude: 3 },
      { latitude: 0, longitude: 7 }
    ]);
    expect(bbox).toEqual({ minLat: -2, maxLat: 1, minLon: 3, maxLon: 7 });
    expect(getBoundingBoxCenter(bbox)).toEqual({ latitude: -0.5, longitude: 5 });
  });

  it('retorna zeros para lista vazia', () => {
    expect(calculateBoundingBox([])).toEqual({ minLat: 0, maxLat: 0, minLon: 0, maxLon: 0 });
  });
});

describe('closePolygon / coordinatesToWkt', () => {
  const tri = [
    { latitude: 0, longitude: 0 },
    { latitude: 0, longitude: 1 },
    { latitude: 0, longitude: 1 },
    { latitude: 1, longitude: 1 }
  ];

  it('remove duplicatas consecutivas e fecha o anel', () => {
    expect(closePolygon(tri)).toEqual([
      { latitude: 0, longitude: 0 },
      { latitude: 0, longitude: 1 },
      { latitude: 1, longitude: 1 },
      { latitude: 0, longitude: 0 }
    ]);
  });

  it('escreve longitude antes de latitude', () => {
    expect(coordinatesToWkt(tri)).toBe('POLYGON((0 0, 1 0, 1 1, 0 0))');
  });

  it('retorna POLYGON EMPTY com menos de três pontos', () => {
    expect(coordinatesToWkt(tri.slice(0, 2))).toBe('POLYGON EMPTY');
  });
});
