import { WarningLevel } from './types';

export const EARTH_RADIUS_M = 6371000;

// Amostragem do rastro
export const MIN_DISTANCE_FOR_NEW_POINT_M = 10;
export const SAMPLING_INTERVAL_MS = 2000;
export const DURATION_TICK_MS = 1000;

// Fechamento do loop
export const CLOSURE_DISTANCE_THRESHOLD_M = 30;
export const MINIMUM_PATH_POINTS = 10;

// Filtro de velocidade (km/h) e contagem de leituras consecutivas
export const WARNING_SPEED_THRESHOLD_KMH = 15;
export const STOP_SPEED_THRESHOLD_KMH = 30;
export const GPS_DRIFT_THRESHOLD_KMH = 50;
export const WARNING_CONSECUTIVE_COUNT = 2;
export const STOP_CONSECUTIVE_COUNT = 2;

// Auto-interseção (valores empíricos, ajustáveis via ClaimConfig)
export const LIVE_SKIP_TAIL_COUNT = 2;
export const MIN_SEGMENT_GAP = 5;
export const SKIP_HEAD_COUNT = 4;
export const SKIP_TAIL_COUNT = 4;
export const INTERSECTION_NOISE_THRESHOLD_M = 10;

// Validação final
export const MINIMUM_TOTAL_DISTANCE_M = 50;
export const MINIMUM_ENCLOSED_AREA_SQM = 100;

// Faixas de proximidade de territórios alheios
export const CAUTION_DISTANCE_M = 100;
export const WARNING_DISTANCE_M = 50;
export const DANGER_DISTANCE_M = 25;

// Roster de territórios
export const ROSTER_REFRESH_MS = 30000;

export const MAX_LOG_ENTRIES = 200;

export const WARNING_COLORS: Record<WarningLevel, string> = {
  [WarningLevel.SAFE]: '#10B981',
  [WarningLevel.CAUTION]: '#FACC15',
  [WarningLevel.WARNING]: '#F97316',
  [WarningLevel.DANGER]: '#FF5A5F',
  [WarningLevel.VIOLATION]: '#DC2626'
};
