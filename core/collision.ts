// Arquivo: core/collision.ts

import { CollisionResult, CollisionType, Coordinate, TerritoryOutline, WarningLevel } from '../types';
import { ClaimConfig } from './config';
import { calculateDistance, isPointInPolygon, segmentsIntersect } from './geo';
import { ClaimLogger } from './logger';

type BandThresholds = Pick<ClaimConfig, 'cautionDistanceM' | 'warningDistanceM' | 'dangerDistanceM'>;

export const SAFE_RESULT: CollisionResult = Object.freeze({
  hasCollision: false,
  collisionType: null,
  warningLevel: WarningLevel.SAFE,
  nearestDistanceMeters: null,
  message: null
});

const violation = (collisionType: CollisionType, message: string): CollisionResult => ({
  hasCollision: true,
  collisionType,
  warningLevel: WarningLevel.VIOLATION,
  nearestDistanceMeters: 0,
  message
});

export const isBlockingLevel = (level: WarningLevel) => level >= WarningLevel.DANGER;

/**
 * Territórios de outros donos (comparação de id sem diferenciar maiúsculas).
 */
export const foreignTerritories = (
  roster: readonly TerritoryOutline[],
  currentUserId: string
): TerritoryOutline[] => {
  const me = currentUserId.toLowerCase();
  return roster.filter(t => t.ownerId.toLowerCase() !== me && t.polygon.length >= 3);
};

export const checkPointCollision = (
  point: Coordinate,
  roster: readonly TerritoryOutline[],
  currentUserId: string,
  logger?: ClaimLogger
): CollisionResult => {
  for (const territory of foreignTerritories(roster, currentUserId)) {
    if (isPointInPolygon(point, territory.polygon)) {
      logger?.error('COLLISION', 'Ponto inicial dentro de território alheio', { owner: territory.ownerId });
      return violation('pointInTerritory', 'Não é possível iniciar a conquista dentro de território alheio!');
    }
  }
  return SAFE_RESULT;
};

/**
 * Cada segmento do rastro contra cada aresta dos polígonos alheios, sem desconto de
 * ruído. O fim de cada segmento também é testado por contenção.
 */
export const checkPathCrossTerritory = (
  path: readonly Coordinate[],
  roster: readonly TerritoryOutline[],
  currentUserId: string,
  logger?: ClaimLogger
): CollisionResult => {
  if (path.length < 2) return SAFE_RESULT;

  const others = foreignTerritories(roster, currentUserId);
  if (others.length === 0) return SAFE_RESULT;

  for (let i = 0; i < path.length - 1; i++) {
    const pathStart = path[i];
    const pathEnd = path[i + 1];

    for (const territory of others) {
      const polygon = territory.polygon;
      for (let j = 0; j < polygon.length; j++) {
        const edgeStart = polygon[j];
        const edgeEnd = polygon[(j + 1) % polygon.length];
        if (segmentsIntersect(pathStart, pathEnd, edgeStart, edgeEnd)) {
          logger?.error('COLLISION', 'Rastro cruzou a borda de território alheio', { segment: i, owner: territory.ownerId });
          return violation('pathCrossesTerritory', 'O rastro não pode atravessar território alheio!');
        }
      }

      if (isPointInPolygon(pathEnd, polygon)) {
        logger?.error('COLLISION', 'Rastro entrou em território alheio', { segment: i, owner: territory.ownerId });
        return violation('pointInTerritory', 'O rastro não pode entrar em território alheio!');
      }
    }
  }

  return SAFE_RESULT;
};

/**
 * Menor distância (m) do ponto até qualquer vértice alheio; Infinity se não houver nenhum.
 */
export const calculateMinDistanceToTerritories = (
  point: Coordinate,
  roster: readonly TerritoryOutline[],
  currentUserId: string
): number => {
  let minDistance = Infinity;
  for (const territory of foreignTerritories(roster, currentUserId)) {
    for (const vertex of territory.polygon) {
      minDistance = Math.min(minDistance, calculateDistance(point, vertex));
    }
  }
  return minDistance;
};

export const warningLevelForDistance = (distance: number, config: BandThresholds): WarningLevel => {
  if (distance > config.cautionDistanceM) return WarningLevel.SAFE;
  if (distance > config.warningDistanceM) return WarningLevel.CAUTION;
  if (distance > config.dangerDistanceM) return WarningLevel.WARNING;
  return WarningLevel.DANGER;
};

const bandMessage = (level: WarningLevel, distance: number): string | null => {
  const m = Math.floor(distance);
  switch (level) {
    case WarningLevel.CAUTION: return `Atenção: território alheio a ${m}m`;
    case WarningLevel.WARNING: return `Aviso: aproximando de território alheio (${m}m)`;
    case WarningLevel.DANGER: return `Perigo: prestes a entrar em território alheio! (${m}m)`;
    default: return null;
  }
};

/**
 * Checagem completa usada ao vivo e antes da finalização. Uma violação real sobrepõe
 * as faixas de proximidade.
 */
export const checkPathCollision = (
  path: readonly Coordinate[],
  roster: readonly TerritoryOutline[],
  currentUserId: string,
  config: BandThresholds,
  logger?: ClaimLogger
): CollisionResult => {
  if (path.length === 0) return SAFE_RESULT;

  if (path.length === 1) {
    const pointResult = checkPointCollision(path[0], roster, currentUserId, logger);
    if (pointResult.hasCollision) return pointResult;
  } else {
    const crossResult = checkPathCrossTerritory(path, roster, currentUserId, logger);
    if (crossResult.hasCollision) return crossResult;
  }

  const tip = path[path.length - 1];
  const minDistance = calculateMinDistanceToTerritories(tip, roster, currentUserId);
  if (!Number.isFinite(minDistance)) return SAFE_RESULT;

  const warningLevel = warningLevelForDistance(minDistance, config);
  if (warningLevel !== WarningLevel.SAFE) {
    logger?.warn('PROXIMITY', `${WarningLevel[warningLevel]} a ${Math.floor(minDistance)}m`);
  }

  return {
    hasCollision: false,
    collisionType: null,
    warningLevel,
    nearestDistanceMeters: minDistance,
    message: bandMessage(warningLevel, minDistance)
  };
};
