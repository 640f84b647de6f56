// Arquivo: core/controller.ts

import { Fix, ValidationResult } from '../types';
import { ClaimConfig } from './config';
import { ClaimLogger } from './logger';
import { TrackingSession } from './session';

/**
 * Fonte de leituras (GPS do aparelho, simulador, replay de arquivo...).
 */
export interface FixSource {
  subscribe(listener: (fix: Fix) => void): () => void;
}

/**
 * Dono único da sessão. Liga a entrega de leituras e os timers (amostragem e duração)
 * à mesma sessão; parar cancela os timers e finaliza na hora.
 */
export class TrackingController {
  private unsubscribe: (() => void) | null = null;
  private sampleTimer: ReturnType<typeof setInterval> | null = null;
  private durationTimer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly session: TrackingSession,
    private readonly source: FixSource,
    private readonly config: ClaimConfig,
    private readonly logger: ClaimLogger
  ) {}

  get isRunning(): boolean {
    return this.sampleTimer !== null;
  }

  /** Passa a receber leituras mesmo fora do rastreamento (posição atual do usuário). */
  connect(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.source.subscribe(fix => this.session.receiveFix(fix));
    this.logger.info('CONTROLLER', 'Fonte de localização conectada');
  }

  start(): boolean {
    this.connect();
    if (!this.session.start()) return false;
    this.startTimers();
    return true;
  }

  stop(): ValidationResult | null {
    this.clearTimers();
    return this.session.stop('manual');
  }

  resume(): boolean {
    if (!this.session.resume()) return false;
    this.startTimers();
    return true;
  }

  reset(): void {
    this.clearTimers();
    this.session.reset();
  }

  dispose(): void {
    this.clearTimers();
    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = null;
    }
  }

  private startTimers() {
    this.clearTimers();
    this.sampleTimer = setInterval(() => {
      this.session.sample();
      // Parada forçada por velocidade acontece dentro do sample
      if (!this.session.isTracking) this.clearTimers();
    }, this.config.samplingIntervalMs);
    this.durationTimer = setInterval(() => this.session.tick(), this.config.durationTickMs);
  }

  private clearTimers() {
    if (this.sampleTimer !== null) {
      clearInterval(this.sampleTimer);
      this.sampleTimer = null;
    }
    if (this.durationTimer !== null) {
      clearInterval(this.durationTimer);
      this.durationTimer = null;
    }
  }
}
