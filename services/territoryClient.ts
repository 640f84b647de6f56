// Arquivo: services/territoryClient.ts

import { BoundingBox, ClaimPayload, Coordinate, ReasonCode, Territory, TerritoryClaim } from '../types';

export class TerritoryApiError extends Error {
  constructor(
    readonly status: number,
    message: string,
    readonly reason: ReasonCode | null = null
  ) {
    super(message);
    this.name = 'TerritoryApiError';
  }
}

export interface FetchResponse {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<FetchResponse>;

export interface TerritoryClientOptions {
  baseUrl?: string;
  sessionToken?: string;
  fetchImpl?: FetchLike;
}

const REASON_CODES: readonly ReasonCode[] = [
  'InsufficientPoints',
  'InsufficientDistance',
  'PathNotClosed',
  'SelfIntersection',
  'InsufficientArea',
  'PointInForeignTerritory',
  'PathCrossesForeignTerritory',
  'TooCloseToForeignTerritory'
];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

const isNumber = (value: unknown): value is number => typeof value === 'number' && Number.isFinite(value);

const toReason = (value: unknown): ReasonCode | null =>
  REASON_CODES.find(code => code === value) ?? null;

const toCoordinate = (value: unknown): Coordinate | null =>
  isRecord(value) && isNumber(value.latitude) && isNumber(value.longitude)
    ? { latitude: value.latitude, longitude: value.longitude }
    : null;

const toBoundingBox = (value: unknown): BoundingBox | null =>
  isRecord(value) && isNumber(value.minLat) && isNumber(value.maxLat) && isNumber(value.minLon) && isNumber(value.maxLon)
    ? { minLat: value.minLat, maxLat: value.maxLat, minLon: value.minLon, maxLon: value.maxLon }
    : null;

/**
 * Converte o JSON da API num Territory; null se faltar algum campo obrigatório.
 */
export const parseTerritory = (value: unknown): Territory | null => {
  if (!isRecord(value)) return null;
  const { id, ownerId, polygon, areaSqm, boundingBox, pointCount, isActive, startedAt, completedAt, createdAt } = value;
  if (typeof id !== 'string' || typeof ownerId !== 'string' || !Array.isArray(polygon)) return null;
  if (!isNumber(areaSqm) || !isNumber(createdAt)) return null;

  const coords: Coordinate[] = [];
  for (const raw of polygon) {
    const c = toCoordinate(raw);
    if (!c) return null;
    coords.push(c);
  }
  const bbox = toBoundingBox(boundingBox);
  if (!bbox) return null;

  return {
    id,
    ownerId,
    polygon: coords,
    areaSqm,
    boundingBox: bbox,
    pointCount: isNumber(pointCount) ? pointCount : coords.length,
    isActive: isActive !== false,
    startedAt: isNumber(startedAt) ? startedAt : null,
    completedAt: isNumber(completedAt) ? completedAt : null,
    createdAt
  };
};

/**
 * Cliente HTTP de /api/territories (lado do app).
 */
export class TerritoryClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private sessionToken: string | undefined;

  constructor(options: TerritoryClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? '';
    this.sessionToken = options.sessionToken;
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
  }

  setSessionToken(token: string | undefined) {
    this.sessionToken = token;
  }

  /** Territórios ativos; `excludeOwnerId` tira os do próprio usuário. */
  async fetchRoster(excludeOwnerId?: string): Promise<Territory[]> {
    const query = excludeOwnerId ? `?exclude=${encodeURIComponent(excludeOwnerId)}` : '';
    return this.loadList(`/api/territories${query}`);
  }

  async fetchMine(ownerId: string): Promise<Territory[]> {
    return this.loadList(`/api/territories?owner=${encodeURIComponent(ownerId)}`);
  }

  async submitClaim(claim: TerritoryClaim): Promise<Territory> {
    const payload: ClaimPayload = { userId: claim.ownerId, claim };
    const data = await this.request('/api/territories', {
      method: 'POST',
      headers: this.headers(),
      body: JSON.stringify(payload)
    });
    const territory = parseTerritory(data);
    if (!territory) throw new TerritoryApiError(502, 'Resposta inválida ao salvar território');
    return territory;
  }

  async deleteTerritory(id: string, userId: string): Promise<void> {
    await this.request(
      `/api/territories?id=${encodeURIComponent(id)}&userId=${encodeURIComponent(userId)}`,
      { method: 'DELETE', headers: this.headers() }
    );
  }

  private async loadList(path: string): Promise<Territory[]> {
    const data = await this.request(path, { method: 'GET', headers: this.headers() });
    if (!isRecord(data) || !Array.isArray(data.territories)) {
      throw new TerritoryApiError(502, 'Resposta inválida ao carregar territórios');
    }
    const territories: Territory[] = [];
    for (const raw of data.territories) {
      const t = parseTerritory(raw);
      if (t) territories.push(t);
    }
    return territories;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.sessionToken) headers.Authorization = `Bearer ${this.sessionToken}`;
    return headers;
  }

  private async request(path: string, init: RequestInit): Promise<unknown> {
    const res = await this.fetchImpl(`${this.baseUrl}${path}`, init);
    const data: unknown = await res.json();
    if (!res.ok) {
      const message = isRecord(data) && typeof data.error === 'string' ? data.error : `HTTP ${res.status}`;
      const reason = isRecord(data) ? toReason(data.reason) : null;
      throw new TerritoryApiError(res.status, message, reason);
    }
    return data;
  }
}
