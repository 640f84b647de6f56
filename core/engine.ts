// Arquivo: core/engine.ts

import { RosterCache } from '../services/rosterCache';
import { TerritoryClient } from '../services/territoryClient';
import { Territory } from '../types';
import { ClaimConfig, resolveClaimConfig } from './config';
import { FixSource, TrackingController } from './controller';
import { ClaimLogger } from './logger';
import { TrackingSession } from './session';

export interface ClaimEngineOptions {
  userId: string;
  fixSource: FixSource;
  /** Sem cliente o roster fica vazio e não há envio ao servidor. */
  client?: TerritoryClient;
  configOverrides?: Partial<ClaimConfig>;
  logger?: ClaimLogger;
  now?: () => number;
}

export interface ClaimEngine {
  config: ClaimConfig;
  logger: ClaimLogger;
  roster: RosterCache;
  session: TrackingSession;
  controller: TrackingController;
  /** Envia a conquista validada; null se a sessão não estiver VALID. */
  submitClaim(): Promise<Territory | null>;
  dispose(): void;
}

/**
 * Monta as peças de uma sessão de conquista: config, log, roster, sessão e controlador.
 */
export const createClaimEngine = (options: ClaimEngineOptions): ClaimEngine => {
  const logger = options.logger ?? new ClaimLogger({ now: options.now });
  const config = resolveClaimConfig(options.configOverrides, logger);
  const { client } = options;

  const roster = new RosterCache(
    async () => (client ? client.fetchRoster(options.userId) : []),
    config.rosterRefreshMs,
    logger,
    options.now
  );

  const session = new TrackingSession({
    userId: options.userId,
    config,
    logger,
    roster,
    now: options.now
  });
  const controller = new TrackingController(session, options.fixSource, config, logger);

  const submitClaim = async (): Promise<Territory | null> => {
    const claim = session.buildClaim();
    if (!claim) {
      logger.warn('UPLOAD', `Nada para enviar no estado ${session.state}`);
      return null;
    }
    if (!client) {
      logger.warn('UPLOAD', 'Sem cliente configurado, conquista mantida só localmente');
      return null;
    }
    try {
      const territory = await client.submitClaim(claim);
      logger.success('UPLOAD', `Território ${territory.id} salvo (${territory.areaSqm.toFixed(0)} m²)`);
      return territory;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error('UPLOAD', `Falha ao enviar conquista: ${message}`);
      throw err;
    }
  };

  return {
    config,
    logger,
    roster,
    session,
    controller,
    submitClaim,
    dispose: () => {
      controller.dispose();
      roster.stopPolling();
    }
  };
};
