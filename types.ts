/**
 * types.ts - Definições centrais do motor de conquista de território.
 * A mesma estrutura circula entre o motor (core), a API (Vercel) e o banco (Postgres).
 */

export interface Coordinate {
  latitude: number;
  longitude: number;
}

/**
 * Leitura bruta do sensor de localização. `timestamp` em ms (epoch).
 */
export interface Fix {
  coordinate: Coordinate;
  timestamp: number;
  horizontalAccuracy?: number;
}

export interface BoundingBox {
  minLat: number;
  maxLat: number;
  minLon: number;
  maxLon: number;
}

export enum WarningLevel {
  SAFE = 0,
  CAUTION = 1,
  WARNING = 2,
  DANGER = 3,
  VIOLATION = 4
}

export type CollisionType = 'pointInTerritory' | 'pathCrossesTerritory';

export interface CollisionResult {
  hasCollision: boolean;
  collisionType: CollisionType | null;
  warningLevel: WarningLevel;
  nearestDistanceMeters: number | null;
  message: string | null;
}

export type ReasonCode =
  | 'InsufficientPoints'
  | 'InsufficientDistance'
  | 'PathNotClosed'
  | 'SelfIntersection'
  | 'InsufficientArea'
  | 'PointInForeignTerritory'
  | 'PathCrossesForeignTerritory'
  | 'TooCloseToForeignTerritory';

export interface ValidationResult {
  readonly isValid: boolean;
  readonly failureReason: ReasonCode | null;
  readonly computedAreaSqm: number;
}

export type SpeedSignal = 'GpsDrift' | 'SpeedWarning' | 'SpeedViolationFatal';

export enum SessionState {
  IDLE = 'IDLE',
  TRACKING = 'TRACKING',
  FINALIZING = 'FINALIZING',
  VALID = 'VALID',
  INVALID = 'INVALID'
}

export type StopReason = 'manual' | 'SpeedViolationFatal';

/**
 * Território já conquistado (linha da tabela `territories`).
 */
export interface Territory {
  id: string;
  ownerId: string;
  polygon: Coordinate[];
  areaSqm: number;
  boundingBox: BoundingBox;
  pointCount: number;
  isActive: boolean;
  startedAt: number | null;
  completedAt: number | null;
  createdAt: number;
}

/**
 * Visão mínima de um território alheio usada pelo detector de colisão.
 */
export interface TerritoryOutline {
  ownerId: string;
  polygon: Coordinate[];
}

/**
 * Registro emitido ao finalizar uma sessão válida.
 */
export interface TerritoryClaim {
  ownerId: string;
  orderedPoints: Coordinate[];
  areaSqm: number;
  boundingBox: BoundingBox;
  pointCount: number;
  startedAt: number;
  completedAt: number;
}

/**
 * Projeção somente-leitura da sessão para a camada de apresentação.
 */
export interface SessionSnapshot {
  state: SessionState;
  pointCount: number;
  pathVersion: number;
  distanceMeters: number;
  durationSeconds: number;
  speedKmh: number;
  speedWarning: string | null;
  isOverSpeed: boolean;
  isClosed: boolean;
  hasLiveSelfIntersection: boolean;
  warningLevel: WarningLevel;
  collisionMessage: string | null;
  nearestDistanceMeters: number | null;
  stopReason: StopReason | null;
  validation: ValidationResult | null;
  canFinalize: boolean;
}

// --- PAYLOADS E RESPOSTAS DE API ---

/**
 * Payload enviado para POST /api/territories
 */
export interface ClaimPayload {
  userId: string;
  claim: TerritoryClaim;
}

/**
 * Resposta de GET /api/territories
 */
export interface RosterResponse {
  territories: Territory[];
  error?: string;
}
