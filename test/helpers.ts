import { offsetMeters } from '../utils/simulator';
import { Coordinate, Fix, TerritoryOutline } from '../types';

export const ORIGIN: Coordinate = { latitude: -23.5505, longitude: -46.6333 };

/** Ponto a `north`/`east` metros da origem. */
export const at = (north: number, east: number, origin: Coordinate = ORIGIN): Coordinate =>
  offsetMeters(origin, north, east);

/**
 * Volta anti-horária num quadrado de 50 m, vértices a cada 12,5 m, terminando a 12,5 m
 * do início (16 pontos).
 */
export const squareLoop = (): Coordinate[] => {
  const pts: [number, number][] = [
    [0, 0], [0, 12.5], [0, 25], [0, 37.5],
    [0, 50], [12.5, 50], [25, 50], [37.5, 50],
    [50, 50], [50, 37.5], [50, 25], [50, 12.5],
    [50, 0], [37.5, 0], [25, 0], [12.5, 0]
  ];
  return pts.map(([n, e]) => at(n, e));
};

/**
 * Rastro em U aberto: (0,0) → (60,0) → (60,60) → (0,60), vértices a cada 15 m (13 pontos).
 * Termina a 60 m do início; o anel fechado teria 3 600 m².
 */
export const openU = (): Coordinate[] => {
  const pts: [number, number][] = [
    [0, 0], [15, 0], [30, 0], [45, 0],
    [60, 0], [60, 15], [60, 30], [60, 45],
    [60, 60], [45, 60], [30, 60], [15, 60], [0, 60]
  ];
  return pts.map(([n, e]) => at(n, e));
};

/** Leituras a cada `stepMs` (padrão 5 s: 12,5 m → 9 km/h). */
export const toFixes = (path: Coordinate[], stepMs = 5000, startTime = 0): Fix[] =>
  path.map((coordinate, i) => ({ coordinate, timestamp: startTime + i * stepMs, horizontalAccuracy: 5 }));

/** Quadrado de 100 m com canto sudoeste em (north, east). */
export const squareTerritory = (ownerId: string, north: number, east: number, side = 100): TerritoryOutline => ({
  ownerId,
  polygon: [at(north, east), at(north, east + side), at(north + side, east + side), at(north + side, east)]
});
