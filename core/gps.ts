// Arquivo: core/gps.ts

import { Fix } from '../types';
import { ClaimConfig } from './config';
import { calculateDistance } from './geo';

export type FixKind = 'normal' | 'drift' | 'overspeedPending' | 'overspeedWarning' | 'fatal';

export interface FixClassification {
  kind: FixKind;
  speedKmh: number;
  /** Contador de excesso de velocidade após esta leitura. */
  consecutiveOverspeedCount: number;
  /** A leitura segue para a amostragem do rastro. */
  accepted: boolean;
  /** A leitura passa a ser a referência da próxima medição de velocidade. */
  updatesLastRecorded: boolean;
}

type SpeedThresholds = Pick<
  ClaimConfig,
  | 'warningSpeedThresholdKmh'
  | 'stopSpeedThresholdKmh'
  | 'gpsDriftThresholdKmh'
  | 'warningConsecutiveCount'
  | 'stopConsecutiveCount'
>;

export const calculateSpeedKmh = (from: Fix, to: Fix): number | null => {
  const elapsedSeconds = (to.timestamp - from.timestamp) / 1000;
  if (elapsedSeconds <= 0) return null;
  return (calculateDistance(from.coordinate, to.coordinate) / elapsedSeconds) * 3.6;
};

/**
 * Classifica uma leitura em relação à última aceita.
 *
 * Saltos acima do limiar de deriva são ruído do GPS: descartados sem tocar no contador
 * de excesso nem na referência. Só o excesso sustentado gera aviso ou parada forçada.
 */
export const classifyFix = (
  fix: Fix,
  lastRecorded: Fix | null,
  consecutiveOverspeedCount: number,
  config: SpeedThresholds
): FixClassification => {
  if (!lastRecorded) {
    return { kind: 'normal', speedKmh: 0, consecutiveOverspeedCount: 0, accepted: true, updatesLastRecorded: true };
  }

  const speedKmh = calculateSpeedKmh(lastRecorded, fix);
  // Sem intervalo de tempo não há velocidade a medir
  if (speedKmh === null) {
    return { kind: 'normal', speedKmh: 0, consecutiveOverspeedCount, accepted: true, updatesLastRecorded: true };
  }

  if (speedKmh > config.gpsDriftThresholdKmh) {
    return { kind: 'drift', speedKmh, consecutiveOverspeedCount, accepted: false, updatesLastRecorded: false };
  }

  if (speedKmh > config.stopSpeedThresholdKmh) {
    const count = consecutiveOverspeedCount + 1;
    return {
      kind: count >= config.stopConsecutiveCount ? 'fatal' : 'overspeedWarning',
      speedKmh,
      consecutiveOverspeedCount: count,
      accepted: false,
      updatesLastRecorded: true
    };
  }

  if (speedKmh > config.warningSpeedThresholdKmh) {
    const count = consecutiveOverspeedCount + 1;
    return {
      kind: count >= config.warningConsecutiveCount ? 'overspeedWarning' : 'overspeedPending',
      speedKmh,
      consecutiveOverspeedCount: count,
      accepted: false,
      updatesLastRecorded: true
    };
  }

  return { kind: 'normal', speedKmh, consecutiveOverspeedCount: 0, accepted: true, updatesLastRecorded: true };
};

/**
 * Filtro com estado: guarda a última leitura aceita, o contador de excesso e o aviso ativo.
 */
export class SpeedFilter {
  private lastRecorded: Fix | null = null;
  private overspeedCount = 0;
  private warning: string | null = null;
  private lastSpeedKmh = 0;

  constructor(private readonly config: SpeedThresholds) {}

  get lastRecordedFix(): Fix | null {
    return this.lastRecorded;
  }

  get consecutiveOverspeedCount(): number {
    return this.overspeedCount;
  }

  get speedWarning(): string | null {
    return this.warning;
  }

  get isOverSpeed(): boolean {
    return this.warning !== null;
  }

  get speedKmh(): number {
    return this.lastSpeedKmh;
  }

  evaluate(fix: Fix): FixClassification {
    const result = classifyFix(fix, this.lastRecorded, this.overspeedCount, this.config);

    if (result.updatesLastRecorded) {
      this.lastRecorded = fix;
      this.lastSpeedKmh = result.speedKmh;
    }
    this.overspeedCount = result.consecutiveOverspeedCount;

    const kmh = result.speedKmh.toFixed(0);
    if (result.kind === 'normal') {
      this.warning = null;
    } else if (result.kind === 'overspeedWarning') {
      this.warning = `Movimento rápido demais (${kmh} km/h), continue a pé`;
    } else if (result.kind === 'fatal') {
      this.warning = `Velocidade excessiva (${kmh} km/h), rastreamento encerrado`;
    }

    return result;
  }

  reset(): void {
    this.lastRecorded = null;
    this.overspeedCount = 0;
    this.warning = null;
    this.lastSpeedKmh = 0;
  }
}
