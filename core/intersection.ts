// Arquivo: core/intersection.ts

import { Coordinate } from '../types';
import { ClaimConfig } from './config';
import { calculateDistance, segmentsIntersect } from './geo';

export interface SelfIntersection {
  /** Índice do primeiro segmento (path[i] → path[i + 1]). */
  firstSegment: number;
  secondSegment: number;
  /** Menor distância entre as extremidades dos dois segmentos. */
  endpointGapM: number;
}

type BatchThresholds = Pick<
  ClaimConfig,
  'minSegmentGap' | 'skipHeadCount' | 'skipTailCount' | 'intersectionNoiseThresholdM'
>;

const minEndpointDistance = (a1: Coordinate, a2: Coordinate, b1: Coordinate, b2: Coordinate): number =>
  Math.min(
    calculateDistance(a1, b1),
    calculateDistance(a1, b2),
    calculateDistance(a2, b1),
    calculateDistance(a2, b2)
  );

/**
 * Checagem ao vivo: só o segmento mais novo contra os anteriores, ignorando os
 * `skipTailCount` segmentos imediatamente antes dele. Retorna o índice do segmento
 * cruzado ou null. Serve apenas de feedback na tela.
 */
export const detectNewSegmentIntersection = (
  path: readonly Coordinate[],
  skipTailCount: number
): number | null => {
  if (path.length < 4) return null;

  const newest = path.length - 2;
  const pA = path[newest];
  const pB = path[newest + 1];

  for (let k = 0; k < newest - skipTailCount; k++) {
    if (segmentsIntersect(pA, pB, path[k], path[k + 1])) {
      return k;
    }
  }
  return null;
};

/**
 * Checagem completa da finalização. Compara todos os pares de segmentos não adjacentes
 * (j ≥ i + minSegmentGap). Pares entre a cabeça e a cauda do rastro ficam de fora, senão
 * o próprio fechamento do loop seria lido como cruzamento. Cruzamentos cujas extremidades
 * ficam a menos de `intersectionNoiseThresholdM` são descontados como ruído do GPS.
 */
export const findSelfIntersection = (
  path: readonly Coordinate[],
  config: BatchThresholds
): SelfIntersection | null => {
  const segmentCount = path.length - 1;
  if (segmentCount < 3) return null;

  const tailStart = segmentCount - config.skipTailCount;
  const gap = Math.max(2, config.minSegmentGap);

  for (let i = 0; i < segmentCount; i++) {
    for (let j = i + gap; j < segmentCount; j++) {
      if (i < config.skipHeadCount && j >= tailStart) continue;

      const p1 = path[i], p2 = path[i + 1];
      const p3 = path[j], p4 = path[j + 1];
      if (!segmentsIntersect(p1, p2, p3, p4)) continue;

      const endpointGapM = minEndpointDistance(p1, p2, p3, p4);
      if (endpointGapM < config.intersectionNoiseThresholdM) continue;

      return { firstSegment: i, secondSegment: j, endpointGapM };
    }
  }
  return null;
};

export const hasSelfIntersection = (path: readonly Coordinate[], config: BatchThresholds): boolean =>
  findSelfIntersection(path, config) !== null;
