import { describe, it, expect } from 'vitest';
import { calculatePolygonArea } from './area';
import { at, squareLoop } from '../test/helpers';

describe('calculatePolygonArea', () => {
  it('mede ~2500 m² num quadrado de 50 m', () => {
    const area = calculatePolygonArea(squareLoop());
    expect(area).toBeGreaterThan(2375);
    expect(area).toBeLessThan(2625);
  });

  it('independe do sentido de percurso', () => {
    const path = squareLoop();
    const reversed = [...path].reverse();
    expect(calculatePolygonArea(reversed)).toBeCloseTo(calculatePolygonArea(path), 3);
  });

  it('independe do vértice inicial', () => {
    const path = squareLoop();
    const rotated = [...path.slice(5), ...path.slice(0, 5)];
    expect(calculatePolygonArea(rotated)).toBeCloseTo(calculatePolygonArea(path), 3);
  });

  it('é zero com menos de três pontos', () => {
    expect(calculatePolygonArea([at(0, 0), at(10, 10)])).toBe(0);
  });
});
