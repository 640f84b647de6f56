// Arquivo: core/closure.ts

import { Coordinate } from '../types';
import { ClaimConfig } from './config';
import { calculateDistance } from './geo';

type ClosureThresholds = Pick<ClaimConfig, 'minimumPathPoints' | 'closureDistanceThresholdM'>;

/**
 * Distância entre o primeiro e o último vértice, ou null se o rastro ainda não
 * tem pontos suficientes para fechar.
 */
export const distanceToStart = (path: readonly Coordinate[], config: ClosureThresholds): number | null => {
  if (path.length < Math.max(2, config.minimumPathPoints)) return null;
  return calculateDistance(path[0], path[path.length - 1]);
};

export const isPathClosed = (path: readonly Coordinate[], config: ClosureThresholds): boolean => {
  const dist = distanceToStart(path, config);
  return dist !== null && dist <= config.closureDistanceThresholdM;
};

export interface ClosureUpdate {
  isClosed: boolean;
  /** true apenas na primeira transição para fechado dentro da sessão. */
  justClosed: boolean;
  distanceToStart: number | null;
}

/**
 * Uma vez fechado, o rastro permanece fechado até o reset da sessão.
 */
export class ClosureDetector {
  private closed = false;

  constructor(private readonly config: ClosureThresholds) {}

  get isClosed(): boolean {
    return this.closed;
  }

  evaluate(path: readonly Coordinate[]): ClosureUpdate {
    if (this.closed) {
      return { isClosed: true, justClosed: false, distanceToStart: distanceToStart(path, this.config) };
    }

    const dist = distanceToStart(path, this.config);
    if (dist !== null && dist <= this.config.closureDistanceThresholdM) {
      this.closed = true;
      return { isClosed: true, justClosed: true, distanceToStart: dist };
    }
    return { isClosed: false, justClosed: false, distanceToStart: dist };
  }

  reset(): void {
    this.closed = false;
  }
}
