// Arquivo: core/sampler.ts

import { Coordinate } from '../types';
import { calculateDistance } from './geo';

export interface SampleResult {
  recorded: boolean;
  /** Distância até o último vértice gravado (0 para o primeiro ponto). */
  distanceFromLast: number;
}

/**
 * Gravador com filtro de distância: transforma o fluxo contínuo de leituras numa
 * sequência esparsa de vértices, independente da frequência do sensor.
 */
export class PathSampler {
  private points: Coordinate[] = [];
  private distance = 0;
  private changeVersion = 0;

  constructor(private readonly minDistanceForNewPointM: number) {}

  get path(): readonly Coordinate[] {
    return this.points;
  }

  get totalDistance(): number {
    return this.distance;
  }

  /** Incrementa a cada mudança do rastro, para os observadores reagirem. */
  get version(): number {
    return this.changeVersion;
  }

  get lastPoint(): Coordinate | null {
    return this.points.length > 0 ? this.points[this.points.length - 1] : null;
  }

  offer(coordinate: Coordinate): SampleResult {
    const last = this.lastPoint;
    if (!last) {
      this.append(coordinate, 0);
      return { recorded: true, distanceFromLast: 0 };
    }

    const dist = calculateDistance(last, coordinate);
    if (dist < this.minDistanceForNewPointM) {
      return { recorded: false, distanceFromLast: dist };
    }

    this.append(coordinate, dist);
    return { recorded: true, distanceFromLast: dist };
  }

  clear(): void {
    this.points = [];
    this.distance = 0;
    this.changeVersion++;
  }

  private append(coordinate: Coordinate, segmentLength: number) {
    this.distance += segmentLength;
    this.points.push({ latitude: coordinate.latitude, longitude: coordinate.longitude });
    this.changeVersion++;
  }
}
