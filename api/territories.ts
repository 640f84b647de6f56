// Arquivo: api/territories.ts

import { Pool } from "pg";
import type { VercelRequest, VercelResponse } from "@vercel/node";
import { checkPathCollision } from "../core/collision";
import { ClaimConfig, DEFAULT_CLAIM_CONFIG } from "../core/config";
import { calculateBoundingBox, calculatePathLength } from "../core/geo";
import { ClaimLogger } from "../core/logger";
import { validateTerritory } from "../core/validation";
import { PgTerritoryRepository, TerritoryRepository } from "../services/territoryRepository";
import { Coordinate, RosterResponse, TerritoryClaim } from "../types";

export interface ApiRequest {
  method?: string;
  headers: { authorization?: string };
  query: Record<string, string | string[] | undefined>;
  body?: unknown;
}

export interface ApiResponse {
  status(code: number): ApiResponse;
  json(body: unknown): unknown;
}

interface ParsedClaim {
  userId: string;
  orderedPoints: Coordinate[];
  startedAt: number;
  completedAt: number;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const isFiniteNumber = (value: unknown): value is number =>
  typeof value === "number" && Number.isFinite(value);

const toCoordinate = (value: unknown): Coordinate | null => {
  if (!isRecord(value)) return null;
  const { latitude, longitude } = value;
  if (!isFiniteNumber(latitude) || !isFiniteNumber(longitude)) return null;
  if (Math.abs(latitude) > 90 || Math.abs(longitude) > 180) return null;
  return { latitude, longitude };
};

/**
 * Valida o corpo de POST /api/territories. Área e bounding box enviados pelo cliente
 * são ignorados: o servidor recalcula tudo a partir dos pontos.
 */
export const parseClaimPayload = (body: unknown): ParsedClaim | null => {
  if (!isRecord(body)) return null;
  const { userId, claim } = body;
  if (typeof userId !== "string" || !userId) return null;
  if (!isRecord(claim) || !Array.isArray(claim.orderedPoints)) return null;
  if (claim.ownerId !== undefined && claim.ownerId !== userId) return null;

  const { startedAt, completedAt } = claim;
  if (!isFiniteNumber(startedAt) || !isFiniteNumber(completedAt) || completedAt < startedAt) return null;

  const orderedPoints: Coordinate[] = [];
  for (const raw of claim.orderedPoints) {
    const coord = toCoordinate(raw);
    if (!coord) return null;
    orderedPoints.push(coord);
  }

  return { userId, orderedPoints, startedAt, completedAt };
};

const firstQueryValue = (value: string | string[] | undefined): string | undefined =>
  Array.isArray(value) ? value[0] : value;

const bearerToken = (authorization: string | undefined) => authorization?.split(" ")[1];

export const createTerritoriesHandler = (
  getRepository: () => TerritoryRepository | null,
  config: ClaimConfig = DEFAULT_CLAIM_CONFIG,
  logger: ClaimLogger = new ClaimLogger()
) => async (req: ApiRequest, res: ApiResponse) => {
  const repository = getRepository();
  if (!repository) return res.status(500).json({ error: "DATABASE_URL não configurada." });

  try {
    if (req.method === "GET") {
      const owner = firstQueryValue(req.query.owner);
      const exclude = firstQueryValue(req.query.exclude)?.toLowerCase();
      let territories = owner ? await repository.loadByOwner(owner) : await repository.loadActive();
      if (!owner && exclude) territories = territories.filter(t => t.ownerId.toLowerCase() !== exclude);

      const body: RosterResponse = { territories };
      return res.status(200).json(body);
    }

    if (req.method === "POST") {
      const parsed = parseClaimPayload(req.body);
      if (!parsed) return res.status(400).json({ error: "Payload de território inválido." });

      const authorized = await repository.verifySession(parsed.userId, bearerToken(req.headers.authorization));
      if (!authorized) {
        return res.status(401).json({ error: "Sessão inválida ou expirada. Faça login novamente." });
      }

      // Checagem autoritativa: o roster do cliente pode estar desatualizado
      const roster = await repository.loadActive();
      const collision = checkPathCollision(parsed.orderedPoints, roster, parsed.userId, config);
      const validation = validateTerritory(
        {
          path: parsed.orderedPoints,
          totalDistance: calculatePathLength(parsed.orderedPoints),
          collision
        },
        config
      );

      if (!validation.isValid) {
        logger.warn("API", `Conquista recusada: ${validation.failureReason}`, { userId: parsed.userId });
        return res.status(422).json({ error: "Território inválido.", reason: validation.failureReason });
      }

      const claim: TerritoryClaim = {
        ownerId: parsed.userId,
        orderedPoints: parsed.orderedPoints,
        areaSqm: validation.computedAreaSqm,
        boundingBox: calculateBoundingBox(parsed.orderedPoints),
        pointCount: parsed.orderedPoints.length,
        startedAt: parsed.startedAt,
        completedAt: parsed.completedAt
      };
      const territory = await repository.insert(claim);
      logger.success("API", `Território ${territory.id} salvo`, { area: territory.areaSqm.toFixed(0) });
      return res.status(201).json(territory);
    }

    if (req.method === "DELETE") {
      const id = firstQueryValue(req.query.id);
      const userId = firstQueryValue(req.query.userId);
      if (!id || !userId) return res.status(400).json({ error: "Parâmetros id e userId são obrigatórios." });

      const authorized = await repository.verifySession(userId, bearerToken(req.headers.authorization));
      if (!authorized) {
        return res.status(401).json({ error: "Sessão inválida ou expirada. Faça login novamente." });
      }

      const removed = await repository.softDelete(id, userId);
      if (!removed) return res.status(404).json({ error: "Território não encontrado." });
      logger.info("API", `Território ${id} desativado`);
      return res.status(200).json({ ok: true });
    }

    return res.status(405).json({ error: "Method not allowed" });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error("API", `Falha em /api/territories: ${message}`);
    return res.status(500).json({ error: `Falha na integridade dos dados: ${message}` });
  }
};

const dbUrl = process.env.DATABASE_URL;
let repository: PgTerritoryRepository | null = null;

const getRepository = () => {
  if (!dbUrl) return null;
  if (!repository) {
    repository = new PgTerritoryRepository(
      new Pool({
        connectionString: dbUrl,
        connectionTimeoutMillis: 10000,
      })
    );
  }
  return repository;
};

const territoriesHandler = createTerritoriesHandler(getRepository);

export default async function handler(req: VercelRequest, res: VercelResponse) {
  await territoriesHandler(req, res);
}
