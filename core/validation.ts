// Arquivo: core/validation.ts

import { CollisionResult, Coordinate, ReasonCode, ValidationResult, WarningLevel } from '../types';
import { calculatePolygonArea } from './area';
import { distanceToStart } from './closure';
import { isBlockingLevel } from './collision';
import { ClaimConfig } from './config';
import { findSelfIntersection } from './intersection';
import { ClaimLogger } from './logger';

export interface ValidationInput {
  path: readonly Coordinate[];
  totalDistance: number;
  /** Resultado de colisão mais recente; nível bloqueante (Danger ou Violation) barra o resto. */
  collision?: CollisionResult | null;
}

const result = (isValid: boolean, failureReason: ReasonCode | null, computedAreaSqm = 0): ValidationResult =>
  Object.freeze({ isValid, failureReason, computedAreaSqm });

export const collisionReason = (collision: CollisionResult): ReasonCode => {
  if (collision.warningLevel !== WarningLevel.VIOLATION) return 'TooCloseToForeignTerritory';
  return collision.collisionType === 'pathCrossesTerritory' ? 'PathCrossesForeignTerritory' : 'PointInForeignTerritory';
};

/**
 * Pipeline ordenado da finalização. Para na primeira falha:
 * colisão → pontos → distância → fechamento → auto-interseção → área.
 */
export const validateTerritory = (
  input: ValidationInput,
  config: ClaimConfig,
  logger?: ClaimLogger
): ValidationResult => {
  const { path, totalDistance, collision } = input;

  if (collision && isBlockingLevel(collision.warningLevel)) {
    const reason = collisionReason(collision);
    logger?.error('VALIDATION', `Bloqueado por colisão: ${reason}`);
    return result(false, reason);
  }

  if (path.length < config.minimumPathPoints) {
    logger?.warn('VALIDATION', `Pontos insuficientes: ${path.length}/${config.minimumPathPoints}`);
    return result(false, 'InsufficientPoints');
  }

  if (totalDistance < config.minimumTotalDistanceM) {
    logger?.warn('VALIDATION', `Distância insuficiente: ${totalDistance.toFixed(0)}m/${config.minimumTotalDistanceM}m`);
    return result(false, 'InsufficientDistance');
  }

  // O cálculo de área liga o último ponto ao primeiro: só vale para rastro fechado
  const gap = distanceToStart(path, config);
  if (gap === null || gap > config.closureDistanceThresholdM) {
    logger?.warn('VALIDATION', `Rastro não fechado: ${gap === null ? '-' : gap.toFixed(1)}m do início`);
    return result(false, 'PathNotClosed');
  }

  const crossing = findSelfIntersection(path, config);
  if (crossing) {
    logger?.warn('VALIDATION', `Auto-interseção entre segmentos ${crossing.firstSegment} e ${crossing.secondSegment}`, {
      gap: crossing.endpointGapM.toFixed(1)
    });
    return result(false, 'SelfIntersection');
  }

  const area = calculatePolygonArea(path);
  if (area < config.minimumEnclosedAreaSqm) {
    logger?.warn('VALIDATION', `Área insuficiente: ${area.toFixed(0)}m²/${config.minimumEnclosedAreaSqm}m²`);
    return result(false, 'InsufficientArea', area);
  }

  logger?.success('VALIDATION', `Território válido: ${area.toFixed(0)}m²`, { points: path.length });
  return result(true, null, area);
};
