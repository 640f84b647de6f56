// Arquivo: services/territoryRepository.ts

import crypto from 'crypto';
import { Pool, PoolClient } from 'pg';
import { coordinatesToWkt } from '../core/geo';
import { Coordinate, Territory, TerritoryClaim } from '../types';

/**
 * Persistência dos territórios. A API depende só desta interface; os testes usam
 * uma implementação em memória.
 */
export interface TerritoryRepository {
  verifySession(userId: string, token: string | undefined): Promise<boolean>;
  insert(claim: TerritoryClaim): Promise<Territory>;
  loadActive(): Promise<Territory[]>;
  loadByOwner(ownerId: string): Promise<Territory[]>;
  softDelete(id: string, ownerId: string): Promise<boolean>;
}

type TerritoryRow = {
  id: string;
  owner_id: string;
  path: unknown;
  area_sqm: string | number;
  point_count: string | number | null;
  is_active: boolean | null;
  bbox_min_lat: string | number;
  bbox_max_lat: string | number;
  bbox_min_lon: string | number;
  bbox_max_lon: string | number;
  started_at: string | number | null;
  completed_at: string | number | null;
  created_at: string | number;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

/**
 * Coluna `path` em JSONB: [{ lat, lon }, ...]. Entradas malformadas são descartadas.
 */
export const parseStoredPath = (raw: unknown): Coordinate[] => {
  if (!Array.isArray(raw)) return [];
  const coords: Coordinate[] = [];
  for (const entry of raw) {
    if (!isRecord(entry)) continue;
    const { lat, lon } = entry;
    if (typeof lat === 'number' && typeof lon === 'number') {
      coords.push({ latitude: lat, longitude: lon });
    }
  }
  return coords;
};

export const toStoredPath = (coords: Coordinate[]) =>
  coords.map(c => ({ lat: c.latitude, lon: c.longitude }));

const toNumberOrNull = (v: string | number | null) => (v === null ? null : Number(v));

export const toTerritory = (row: TerritoryRow): Territory => {
  const polygon = parseStoredPath(row.path);
  return {
    id: row.id,
    ownerId: row.owner_id,
    polygon,
    areaSqm: Number(row.area_sqm),
    boundingBox: {
      minLat: Number(row.bbox_min_lat),
      maxLat: Number(row.bbox_max_lat),
      minLon: Number(row.bbox_min_lon),
      maxLon: Number(row.bbox_max_lon)
    },
    pointCount: row.point_count === null ? polygon.length : Number(row.point_count),
    isActive: row.is_active ?? true,
    startedAt: toNumberOrNull(row.started_at),
    completedAt: toNumberOrNull(row.completed_at),
    createdAt: Number(row.created_at)
  };
};

export const ensureTables = async (client: PoolClient) => {
  await client.query(`
    CREATE TABLE IF NOT EXISTS territories (
      id TEXT PRIMARY KEY,
      owner_id TEXT NOT NULL,
      name TEXT,
      path JSONB NOT NULL,
      polygon TEXT NOT NULL,
      area_sqm DOUBLE PRECISION NOT NULL,
      point_count INTEGER,
      is_active BOOLEAN DEFAULT TRUE,
      bbox_min_lat DOUBLE PRECISION,
      bbox_max_lat DOUBLE PRECISION,
      bbox_min_lon DOUBLE PRECISION,
      bbox_max_lon DOUBLE PRECISION,
      started_at BIGINT,
      completed_at BIGINT,
      created_at BIGINT NOT NULL
    );
  `);

  await client.query(`CREATE INDEX IF NOT EXISTS idx_territories_owner ON territories(owner_id);`);
  await client.query(`CREATE INDEX IF NOT EXISTS idx_territories_active ON territories(is_active);`);
};

export class PgTerritoryRepository implements TerritoryRepository {
  private tablesReady = false;

  constructor(private readonly pool: Pool) {}

  async verifySession(userId: string, token: string | undefined): Promise<boolean> {
    if (!token) return false;
    const { rows } = await this.pool.query(
      'SELECT id FROM users WHERE id = $1 AND session_token = $2',
      [userId, token]
    );
    return rows.length > 0;
  }

  async insert(claim: TerritoryClaim): Promise<Territory> {
    const client = await this.pool.connect();
    try {
      await this.prepare(client);
      await client.query('BEGIN');
      const { rows } = await client.query<TerritoryRow>(
        `INSERT INTO territories (
           id, owner_id, path, polygon, area_sqm, point_count, is_active,
           bbox_min_lat, bbox_max_lat, bbox_min_lon, bbox_max_lon,
           started_at, completed_at, created_at
         )
         VALUES ($1, $2, $3, $4, $5, $6, TRUE, $7, $8, $9, $10, $11, $12, $13)
         RETURNING *`,
        [
          `t_${crypto.randomBytes(8).toString('hex')}`,
          claim.ownerId,
          JSON.stringify(toStoredPath(claim.orderedPoints)),
          coordinatesToWkt(claim.orderedPoints),
          claim.areaSqm,
          claim.pointCount,
          claim.boundingBox.minLat,
          claim.boundingBox.maxLat,
          claim.boundingBox.minLon,
          claim.boundingBox.maxLon,
          claim.startedAt,
          claim.completedAt,
          Date.now()
        ]
      );
      await client.query('COMMIT');
      return toTerritory(rows[0]);
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    } finally {
      client.release();
    }
  }

  async loadActive(): Promise<Territory[]> {
    await this.prepareOnce();
    const { rows } = await this.pool.query<TerritoryRow>(
      'SELECT * FROM territories WHERE is_active = TRUE'
    );
    return rows.map(toTerritory);
  }

  async loadByOwner(ownerId: string): Promise<Territory[]> {
    await this.prepareOnce();
    const { rows } = await this.pool.query<TerritoryRow>(
      `SELECT * FROM territories
       WHERE LOWER(owner_id) = LOWER($1) AND is_active = TRUE
       ORDER BY created_at DESC`,
      [ownerId]
    );
    return rows.map(toTerritory);
  }

  async softDelete(id: string, ownerId: string): Promise<boolean> {
    await this.prepareOnce();
    const result = await this.pool.query(
      'UPDATE territories SET is_active = FALSE WHERE id = $1 AND owner_id = $2 AND is_active = TRUE',
      [id, ownerId]
    );
    return (result.rowCount ?? 0) > 0;
  }

  private async prepareOnce() {
    if (this.tablesReady) return;
    const client = await this.pool.connect();
    try {
      await this.prepare(client);
    } finally {
      client.release();
    }
  }

  private async prepare(client: PoolClient) {
    if (this.tablesReady) return;
    await ensureTables(client);
    this.tablesReady = true;
  }
}
