// Arquivo: utils/simulator.ts

import { EARTH_RADIUS_M } from '../constants';
import { FixSource } from '../core/controller';
import { calculateDistance, toRadians } from '../core/geo';
import { Coordinate, Fix } from '../types';

const toDegrees = (rad: number) => (rad * 180) / Math.PI;

/**
 * Anda `stepMeters` de `from` em direção a `to` pelo grande círculo. Não passa do destino.
 */
export const moveTowardsMeters = (from: Coordinate, to: Coordinate, stepMeters: number): Coordinate => {
  const dist = calculateDistance(from, to);
  if (dist === 0) return { ...from };
  if (stepMeters >= dist) return { ...to };

  const lat1 = toRadians(from.latitude);
  const lon1 = toRadians(from.longitude);
  const lat2 = toRadians(to.latitude);
  const dLon = toRadians(to.longitude - from.longitude);

  const y = Math.sin(dLon) * Math.cos(lat2);
  const x = Math.cos(lat1) * Math.sin(lat2) - Math.sin(lat1) * Math.cos(lat2) * Math.cos(dLon);
  const brng = Math.atan2(y, x);
  const angDist = stepMeters / EARTH_RADIUS_M;

  const lat3 = Math.asin(Math.sin(lat1) * Math.cos(angDist) + Math.cos(lat1) * Math.sin(angDist) * Math.cos(brng));
  const lon3 = lon1 + Math.atan2(
    Math.sin(brng) * Math.sin(angDist) * Math.cos(lat1),
    Math.cos(angDist) - Math.sin(lat1) * Math.sin(lat3)
  );
  return { latitude: toDegrees(lat3), longitude: ((toDegrees(lon3) + 540) % 360) - 180 };
};

/** Desloca uma coordenada em metros (aproximação local, boa para dezenas/centenas de metros). */
export const offsetMeters = (origin: Coordinate, northMeters: number, eastMeters: number): Coordinate => ({
  latitude: origin.latitude + toDegrees(northMeters / EARTH_RADIUS_M),
  longitude: origin.longitude + toDegrees(eastMeters / (EARTH_RADIUS_M * Math.cos(toRadians(origin.latitude))))
});

export interface RouteOptions {
  speedMps: number;
  intervalMs: number;
  startTime?: number;
  accuracy?: number;
}

/**
 * Leituras a cada `intervalMs` percorrendo os waypoints na velocidade dada.
 * A primeira leitura é o primeiro waypoint; cada waypoint intermediário também vira leitura.
 */
export const buildRouteFixes = (waypoints: Coordinate[], options: RouteOptions): Fix[] => {
  if (waypoints.length === 0) return [];
  const { speedMps, intervalMs, startTime = 0, accuracy = 5 } = options;
  const step = speedMps * (intervalMs / 1000);

  let t = startTime;
  let current = waypoints[0];
  const fixes: Fix[] = [{ coordinate: current, timestamp: t, horizontalAccuracy: accuracy }];

  for (let i = 1; i < waypoints.length; i++) {
    const target = waypoints[i];
    let remaining = calculateDistance(current, target);
    while (remaining > 0) {
      // Resto de arredondamento não vira uma leitura extra
      const moved = remaining - step < 1e-6 ? remaining : step;
      current = moved === remaining ? target : moveTowardsMeters(current, target, step);
      remaining = moved === remaining ? 0 : calculateDistance(current, target);
      t += (moved / speedMps) * 1000;
      fixes.push({ coordinate: current, timestamp: Math.round(t), horizontalAccuracy: accuracy });
    }
  }
  return fixes;
};

type FixListener = (fix: Fix) => void;

/**
 * Fonte de leituras para modo de teste: emissão manual ou replay temporizado.
 */
export class SimulatedFixSource implements FixSource {
  private readonly listeners = new Set<FixListener>();
  private timer: ReturnType<typeof setInterval> | null = null;

  subscribe(listener: FixListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(fix: Fix): void {
    this.listeners.forEach(listener => listener(fix));
  }

  /** Emite uma leitura a cada `intervalMs`; chama `onDone` ao esgotar a lista. */
  play(fixes: Fix[], intervalMs: number, onDone?: () => void): void {
    this.stop();
    let index = 0;
    this.timer = setInterval(() => {
      if (index >= fixes.length) {
        this.stop();
        onDone?.();
        return;
      }
      this.emit(fixes[index]);
      index++;
    }, intervalMs);
  }

  stop(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  get isPlaying(): boolean {
    return this.timer !== null;
  }
}
