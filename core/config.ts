// Arquivo: core/config.ts

import * as C from '../constants';
import { ClaimLogger } from './logger';

export interface ClaimConfig {
  minDistanceForNewPointM: number;
  samplingIntervalMs: number;
  durationTickMs: number;
  closureDistanceThresholdM: number;
  minimumPathPoints: number;
  warningSpeedThresholdKmh: number;
  stopSpeedThresholdKmh: number;
  gpsDriftThresholdKmh: number;
  warningConsecutiveCount: number;
  stopConsecutiveCount: number;
  liveSkipTailCount: number;
  minSegmentGap: number;
  skipHeadCount: number;
  skipTailCount: number;
  intersectionNoiseThresholdM: number;
  minimumTotalDistanceM: number;
  minimumEnclosedAreaSqm: number;
  cautionDistanceM: number;
  warningDistanceM: number;
  dangerDistanceM: number;
  rosterRefreshMs: number;
}

export const DEFAULT_CLAIM_CONFIG: Readonly<ClaimConfig> = Object.freeze({
  minDistanceForNewPointM: C.MIN_DISTANCE_FOR_NEW_POINT_M,
  samplingIntervalMs: C.SAMPLING_INTERVAL_MS,
  durationTickMs: C.DURATION_TICK_MS,
  closureDistanceThresholdM: C.CLOSURE_DISTANCE_THRESHOLD_M,
  minimumPathPoints: C.MINIMUM_PATH_POINTS,
  warningSpeedThresholdKmh: C.WARNING_SPEED_THRESHOLD_KMH,
  stopSpeedThresholdKmh: C.STOP_SPEED_THRESHOLD_KMH,
  gpsDriftThresholdKmh: C.GPS_DRIFT_THRESHOLD_KMH,
  warningConsecutiveCount: C.WARNING_CONSECUTIVE_COUNT,
  stopConsecutiveCount: C.STOP_CONSECUTIVE_COUNT,
  liveSkipTailCount: C.LIVE_SKIP_TAIL_COUNT,
  minSegmentGap: C.MIN_SEGMENT_GAP,
  skipHeadCount: C.SKIP_HEAD_COUNT,
  skipTailCount: C.SKIP_TAIL_COUNT,
  intersectionNoiseThresholdM: C.INTERSECTION_NOISE_THRESHOLD_M,
  minimumTotalDistanceM: C.MINIMUM_TOTAL_DISTANCE_M,
  minimumEnclosedAreaSqm: C.MINIMUM_ENCLOSED_AREA_SQM,
  cautionDistanceM: C.CAUTION_DISTANCE_M,
  warningDistanceM: C.WARNING_DISTANCE_M,
  dangerDistanceM: C.DANGER_DISTANCE_M,
  rosterRefreshMs: C.ROSTER_REFRESH_MS
});

// Contagens e intervalos precisam ser inteiros; ruído e distâncias aceitam frações
const INTEGER_KEYS: ReadonlySet<keyof ClaimConfig> = new Set<keyof ClaimConfig>([
  'samplingIntervalMs',
  'durationTickMs',
  'minimumPathPoints',
  'warningConsecutiveCount',
  'stopConsecutiveCount',
  'liveSkipTailCount',
  'minSegmentGap',
  'skipHeadCount',
  'skipTailCount',
  'rosterRefreshMs'
]);

const isConfigKey = (key: string): key is keyof ClaimConfig =>
  Object.prototype.hasOwnProperty.call(DEFAULT_CLAIM_CONFIG, key);

/**
 * Mescla ajustes parciais sobre os valores padrão. Valores não numéricos, negativos
 * ou inteiros fracionados são descartados (com aviso) e o padrão é mantido.
 */
export const resolveClaimConfig = (
  overrides: Partial<ClaimConfig> = {},
  logger?: ClaimLogger
): ClaimConfig => {
  const resolved: ClaimConfig = { ...DEFAULT_CLAIM_CONFIG };

  for (const [key, value] of Object.entries(overrides)) {
    if (!isConfigKey(key) || value === undefined) continue;

    const valid =
      typeof value === 'number' &&
      Number.isFinite(value) &&
      value >= 0 &&
      (!INTEGER_KEYS.has(key) || Number.isInteger(value));

    if (!valid) {
      logger?.warn('CONFIG', `Valor inválido para ${key}: ${String(value)}, mantendo ${DEFAULT_CLAIM_CONFIG[key]}`);
      continue;
    }
    resolved[key] = value;
  }

  if (resolved.warningSpeedThresholdKmh > resolved.stopSpeedThresholdKmh ||
      resolved.stopSpeedThresholdKmh > resolved.gpsDriftThresholdKmh) {
    logger?.warn('CONFIG', 'Limiares de velocidade fora de ordem (aviso ≤ parada ≤ deriva)');
  }

  return resolved;
};
