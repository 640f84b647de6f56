// Arquivo: core/area.ts

import { EARTH_RADIUS_M } from '../constants';
import { Coordinate } from '../types';
import { toRadians } from './geo';

/**
 * Área (m²) do polígono fechado pela fórmula do laço com correção esférica:
 * |R² · Σ (lonᵢ₊₁ − lonᵢ)(2 + sin latᵢ + sin latᵢ₊₁)| / 2, fechando último → primeiro.
 * O módulo torna o resultado independente do sentido de percurso.
 */
export const calculatePolygonArea = (path: readonly Coordinate[]): number => {
  if (path.length < 3) return 0;

  let sum = 0;
  for (let i = 0; i < path.length; i++) {
    const p1 = path[i];
    const p2 = path[(i + 1) % path.length];
    sum += toRadians(p2.longitude - p1.longitude) *
      (2 + Math.sin(toRadians(p1.latitude)) + Math.sin(toRadians(p2.latitude)));
  }

  return Math.abs(sum * EARTH_RADIUS_M * EARTH_RADIUS_M / 2);
};
