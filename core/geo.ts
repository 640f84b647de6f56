// Arquivo: core/geo.ts

import { EARTH_RADIUS_M } from '../constants';
import { BoundingBox, Coordinate } from '../types';

export const toRadians = (deg: number) => deg * Math.PI / 180;

export const calculateDistance = (p1: Coordinate, p2: Coordinate): number => {
  const dLat = toRadians(p2.latitude - p1.latitude);
  const dLng = toRadians(p2.longitude - p1.longitude);
  const a = Math.sin(dLat / 2) * Math.sin(dLat / 2) +
            Math.cos(toRadians(p1.latitude)) * Math.cos(toRadians(p2.latitude)) *
            Math.sin(dLng / 2) * Math.sin(dLng / 2);
  return EARTH_RADIUS_M * 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
};

/**
 * Soma das distâncias entre vértices consecutivos (sem fechar o polígono).
 */
export const calculatePathLength = (pts: Coordinate[]): number => {
  let dist = 0;
  for (let i = 0; i < pts.length - 1; i++) {
    dist += calculateDistance(pts[i], pts[i + 1]);
  }
  return dist;
};

/**
 * Orientação anti-horária de A→B→C no plano (x = longitude, y = latitude).
 */
export const ccw = (a: Coordinate, b: Coordinate, c: Coordinate): boolean =>
  (c.latitude - a.latitude) * (b.longitude - a.longitude) >
  (b.latitude - a.latitude) * (c.longitude - a.longitude);

export const segmentsIntersect = (
  p1: Coordinate,
  p2: Coordinate,
  p3: Coordinate,
  p4: Coordinate
): boolean => ccw(p1, p3, p4) !== ccw(p2, p3, p4) && ccw(p1, p2, p3) !== ccw(p1, p2, p4);

/**
 * Ray casting: conta cruzamentos de um raio horizontal com as arestas do polígono.
 * Número ímpar de cruzamentos = ponto dentro.
 */
export const isPointInPolygon = (point: Coordinate, polygon: Coordinate[]): boolean => {
  if (polygon.length < 3) return false;

  const x = point.longitude, y = point.latitude;
  let inside = false;
  for (let i = 0, j = polygon.length - 1; i < polygon.length; j = i++) {
    const xi = polygon[i].longitude, yi = polygon[i].latitude;
    const xj = polygon[j].longitude, yj = polygon[j].latitude;
    const intersect = ((yi > y) !== (yj > y)) && (x < (xj - xi) * (y - yi) / (yj - yi) + xi);
    if (intersect) inside = !inside;
  }
  return inside;
};

export const calculateBoundingBox = (coords: Coordinate[]): BoundingBox => {
  if (coords.length === 0) return { minLat: 0, maxLat: 0, minLon: 0, maxLon: 0 };

  let minLat = Infinity, maxLat = -Infinity;
  let minLon = Infinity, maxLon = -Infinity;
  for (const p of coords) {
    if (p.latitude < minLat) minLat = p.latitude;
    if (p.latitude > maxLat) maxLat = p.latitude;
    if (p.longitude < minLon) minLon = p.longitude;
    if (p.longitude > maxLon) maxLon = p.longitude;
  }
  return { minLat, maxLat, minLon, maxLon };
};

export const getBoundingBoxCenter = (bbox: BoundingBox): Coordinate => ({
  latitude: (bbox.minLat + bbox.maxLat) / 2,
  longitude: (bbox.minLon + bbox.maxLon) / 2
});

const samePoint = (a: Coordinate, b: Coordinate) =>
  Math.abs(a.latitude - b.latitude) <= 1e-10 && Math.abs(a.longitude - b.longitude) <= 1e-10;

/**
 * Remove duplicatas consecutivas e garante fechamento estrito (primeiro == último).
 */
export const closePolygon = (poly: Coordinate[]): Coordinate[] => {
  const result: Coordinate[] = [];
  for (const p of poly) {
    const prev = result[result.length - 1];
    if (!prev || !samePoint(p, prev)) {
      result.push({ latitude: p.latitude, longitude: p.longitude });
    }
  }

  if (result.length >= 3 && !samePoint(result[0], result[result.length - 1])) {
    result.push({ ...result[0] });
  }
  return result;
};

/**
 * WKT usa "longitude latitude".
 */
export const coordinatesToWkt = (coords: Coordinate[]): string => {
  if (coords.length < 3) return 'POLYGON EMPTY';

  const ring = closePolygon(coords);
  const pointStrings = ring.map(c => `${c.longitude} ${c.latitude}`);
  return `POLYGON((${pointStrings.join(', ')}))`;
};
