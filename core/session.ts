// Arquivo: core/session.ts

import {
  CollisionResult,
  Coordinate,
  Fix,
  SessionSnapshot,
  SessionState,
  SpeedSignal,
  StopReason,
  TerritoryClaim,
  TerritoryOutline,
  ValidationResult
} from '../types';
import { ClaimConfig } from './config';
import { ClosureDetector } from './closure';
import { SAFE_RESULT, checkPathCollision, isBlockingLevel } from './collision';
import { calculateBoundingBox } from './geo';
import { FixKind, SpeedFilter } from './gps';
import { detectNewSegmentIntersection } from './intersection';
import { ClaimLogger } from './logger';
import { PathSampler } from './sampler';
import { validateTerritory } from './validation';

export interface RosterSource {
  getRoster(): readonly TerritoryOutline[];
}

export const EMPTY_ROSTER: RosterSource = { getRoster: () => [] };

export type SessionListener = (snapshot: SessionSnapshot) => void;

export interface TrackingSessionOptions {
  userId: string;
  config: ClaimConfig;
  logger: ClaimLogger;
  roster?: RosterSource;
  now?: () => number;
}

export interface FixOutcome {
  kind: FixKind;
  signal: SpeedSignal | null;
  recorded: boolean;
  speedKmh: number;
}

const SIGNALS: Record<FixKind, SpeedSignal | null> = {
  normal: null,
  drift: 'GpsDrift',
  overspeedPending: null,
  overspeedWarning: 'SpeedWarning',
  fatal: 'SpeedViolationFatal'
};

/**
 * Sessão de rastreamento de um usuário: IDLE → TRACKING → FINALIZING → VALID | INVALID.
 *
 * Todo o estado mutável mora aqui e só muda por estes métodos síncronos, chamados do
 * mesmo loop de eventos pelo TrackingController (entrega de leituras e tick de amostragem).
 */
export class TrackingSession {
  readonly userId: string;
  private readonly config: ClaimConfig;
  private readonly logger: ClaimLogger;
  private readonly roster: RosterSource;
  private readonly now: () => number;

  private readonly speed: SpeedFilter;
  private readonly sampler: PathSampler;
  private readonly closure: ClosureDetector;

  private currentState: SessionState = SessionState.IDLE;
  private startedAt: number | null = null;
  private completedAt: number | null = null;
  private durationSeconds = 0;
  private latestFix: Fix | null = null;
  private latestFixPending = false;
  private liveIntersection: number | null = null;
  private collision: CollisionResult = SAFE_RESULT;
  private validation: ValidationResult | null = null;
  private stopReason: StopReason | null = null;
  private lastSignal: SpeedSignal | null = null;

  private readonly listeners = new Set<SessionListener>();
  private cachedSnapshot: SessionSnapshot | null = null;

  constructor(options: TrackingSessionOptions) {
    this.userId = options.userId;
    this.config = options.config;
    this.logger = options.logger;
    this.roster = options.roster ?? EMPTY_ROSTER;
    this.now = options.now ?? Date.now;

    this.speed = new SpeedFilter(this.config);
    this.sampler = new PathSampler(this.config.minDistanceForNewPointM);
    this.closure = new ClosureDetector(this.config);
  }

  get state(): SessionState {
    return this.currentState;
  }

  get path(): readonly Coordinate[] {
    return this.sampler.path;
  }

  get totalDistance(): number {
    return this.sampler.totalDistance;
  }

  get lastRecordedFix(): Fix | null {
    return this.speed.lastRecordedFix;
  }

  get consecutiveOverspeedCount(): number {
    return this.speed.consecutiveOverspeedCount;
  }

  get lastSpeedSignal(): SpeedSignal | null {
    return this.lastSignal;
  }

  get collisionResult(): CollisionResult {
    return this.collision;
  }

  get validationResult(): ValidationResult | null {
    return this.validation;
  }

  get isTracking(): boolean {
    return this.currentState === SessionState.TRACKING;
  }

  // --- Ciclo de vida ---

  start(): boolean {
    if (this.currentState !== SessionState.IDLE) {
      this.logger.warn('SESSION', `Início ignorado no estado ${this.currentState}`);
      return false;
    }

    this.clearTrackingState();
    this.currentState = SessionState.TRACKING;
    this.startedAt = this.now();
    this.logger.info('SESSION', 'Rastreamento iniciado');

    // Já existe posição conhecida: vira o primeiro vértice
    if (this.latestFix) {
      this.latestFixPending = true;
      this.sample();
    }

    this.notify();
    return true;
  }

  /**
   * Encerra o rastreamento (manual ou forçado) e roda a finalização na hora.
   */
  stop(reason: StopReason = 'manual'): ValidationResult | null {
    if (this.currentState !== SessionState.TRACKING) {
      this.logger.warn('SESSION', `Parada ignorada no estado ${this.currentState}`);
      return null;
    }

    this.currentState = SessionState.FINALIZING;
    this.stopReason = reason;
    this.completedAt = this.now();
    this.updateDuration(this.completedAt);
    this.logger.info('SESSION', `Rastreamento encerrado (${reason}), ${this.path.length} pontos, ${this.totalDistance.toFixed(0)}m`);

    return this.finalize();
  }

  /**
   * Uma sessão inválida encerrada manualmente pode continuar do ponto onde parou.
   */
  resume(): boolean {
    if (this.currentState !== SessionState.INVALID) {
      this.logger.warn('SESSION', `Retomada ignorada no estado ${this.currentState}`);
      return false;
    }
    if (this.stopReason !== 'manual') {
      this.logger.warn('SESSION', `Retomada recusada: sessão encerrada por ${this.stopReason}`);
      return false;
    }

    this.currentState = SessionState.TRACKING;
    this.validation = null;
    this.stopReason = null;
    this.completedAt = null;
    // O intervalo parado não entra no cálculo de velocidade
    this.speed.reset();
    this.lastSignal = null;
    this.logger.info('SESSION', 'Rastreamento retomado');
    this.notify();
    return true;
  }

  reset(): void {
    this.clearTrackingState();
    this.currentState = SessionState.IDLE;
    this.logger.info('SESSION', 'Sessão reiniciada');
    this.notify();
  }

  // --- Produtores ---

  /** Entrega do sensor: guarda a última leitura para o próximo tick. */
  receiveFix(fix: Fix): void {
    this.latestFix = fix;
    this.latestFixPending = true;
  }

  /**
   * Tick de amostragem: avalia a última leitura recebida, se ainda não foi avaliada.
   */
  sample(): FixOutcome | null {
    if (this.currentState !== SessionState.TRACKING) return null;
    if (!this.latestFix || !this.latestFixPending) return null;

    this.latestFixPending = false;
    return this.process(this.latestFix);
  }

  ingest(fix: Fix): FixOutcome | null {
    this.receiveFix(fix);
    return this.sample();
  }

  /** Tick de duração. */
  tick(): void {
    if (this.currentState !== SessionState.TRACKING) return;
    this.updateDuration(this.now());
    this.notify();
  }

  // --- Saída ---

  buildClaim(completedAt: number = this.completedAt ?? this.now()): TerritoryClaim | null {
    if (this.currentState !== SessionState.VALID || !this.validation || this.startedAt === null) {
      return null;
    }

    const orderedPoints = this.path.map(p => ({ latitude: p.latitude, longitude: p.longitude }));
    return {
      ownerId: this.userId,
      orderedPoints,
      areaSqm: this.validation.computedAreaSqm,
      boundingBox: calculateBoundingBox(orderedPoints),
      pointCount: orderedPoints.length,
      startedAt: this.startedAt,
      completedAt
    };
  }

  getSnapshot(): SessionSnapshot {
    if (!this.cachedSnapshot) {
      this.cachedSnapshot = this.buildSnapshot();
    }
    return this.cachedSnapshot;
  }

  subscribe(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // --- Interno ---

  private process(fix: Fix): FixOutcome {
    const classification = this.speed.evaluate(fix);
    const signal = SIGNALS[classification.kind];
    const kmh = classification.speedKmh.toFixed(0);
    this.lastSignal = signal;

    switch (classification.kind) {
      case 'drift':
        this.logger.warn('GPS DRIFT', `Salto de ${kmh} km/h ignorado`);
        return { kind: 'drift', signal, recorded: false, speedKmh: classification.speedKmh };

      case 'overspeedPending':
        this.logger.info('SPEED', `Excesso ${classification.consecutiveOverspeedCount}/${this.config.warningConsecutiveCount} (${kmh} km/h)`);
        this.notify();
        return { kind: 'overspeedPending', signal, recorded: false, speedKmh: classification.speedKmh };

      case 'overspeedWarning':
        this.logger.warn('SPEED', `Aviso de velocidade: ${kmh} km/h`, { count: classification.consecutiveOverspeedCount });
        this.notify();
        return { kind: 'overspeedWarning', signal, recorded: false, speedKmh: classification.speedKmh };

      case 'fatal':
        this.logger.error('SPEED', `Excesso sustentado de ${kmh} km/h, encerrando rastreamento`);
        this.stop('SpeedViolationFatal');
        return { kind: 'fatal', signal, recorded: false, speedKmh: classification.speedKmh };

      case 'normal':
        break;
    }

    const sampled = this.sampler.offer(fix.coordinate);
    if (sampled.recorded) {
      this.onVertexRecorded(sampled.distanceFromLast);
    }
    this.notify();
    return { kind: 'normal', signal, recorded: sampled.recorded, speedKmh: classification.speedKmh };
  }

  private onVertexRecorded(segmentLength: number) {
    const path = this.sampler.path;
    const p = path[path.length - 1];
    this.logger.info('PATH', `Ponto #${path.length}: (${p.latitude.toFixed(6)}, ${p.longitude.toFixed(6)})`, {
      segment: segmentLength.toFixed(1)
    });

    const closure = this.closure.evaluate(path);
    if (closure.justClosed && closure.distanceToStart !== null) {
      this.logger.success('LOOP OK', `Loop fechado a ${closure.distanceToStart.toFixed(1)}m do início`);
    }

    const crossed = detectNewSegmentIntersection(path, this.config.liveSkipTailCount);
    if (crossed !== null && this.liveIntersection === null) {
      this.logger.warn('INTERSECTION', `Novo segmento cruza o segmento ${crossed}`);
    }
    this.liveIntersection = crossed;

    this.collision = checkPathCollision(path, this.roster.getRoster(), this.userId, this.config, this.logger);
  }

  private finalize(): ValidationResult {
    // Checagem autoritativa com o roster mais recente disponível
    this.collision = checkPathCollision(this.path, this.roster.getRoster(), this.userId, this.config, this.logger);

    const validation = validateTerritory(
      { path: this.path, totalDistance: this.totalDistance, collision: this.collision },
      this.config,
      this.logger
    );

    this.validation = validation;
    this.currentState = validation.isValid ? SessionState.VALID : SessionState.INVALID;
    this.notify();
    return validation;
  }

  private updateDuration(at: number) {
    if (this.startedAt === null) return;
    this.durationSeconds = Math.max(0, (at - this.startedAt) / 1000);
  }

  private clearTrackingState() {
    this.sampler.clear();
    this.speed.reset();
    this.closure.reset();
    this.startedAt = null;
    this.completedAt = null;
    this.durationSeconds = 0;
    this.liveIntersection = null;
    this.collision = SAFE_RESULT;
    this.validation = null;
    this.stopReason = null;
    this.lastSignal = null;
  }

  private buildSnapshot(): SessionSnapshot {
    const blocking = isBlockingLevel(this.collision.warningLevel);
    return {
      state: this.currentState,
      pointCount: this.path.length,
      pathVersion: this.sampler.version,
      distanceMeters: this.totalDistance,
      durationSeconds: this.durationSeconds,
      speedKmh: this.speed.speedKmh,
      speedWarning: this.speed.speedWarning,
      isOverSpeed: this.speed.isOverSpeed,
      isClosed: this.closure.isClosed,
      hasLiveSelfIntersection: this.liveIntersection !== null,
      warningLevel: this.collision.warningLevel,
      collisionMessage: this.collision.message,
      nearestDistanceMeters: this.collision.nearestDistanceMeters,
      stopReason: this.stopReason,
      validation: this.validation,
      canFinalize: this.currentState === SessionState.TRACKING && this.closure.isClosed && !blocking
    };
  }

  private notify() {
    this.cachedSnapshot = null;
    if (this.listeners.size === 0) return;
    const snapshot = this.getSnapshot();
    this.listeners.forEach(listener => listener(snapshot));
  }
}

