// Arquivo: App.tsx

import React, { useState, useEffect, useMemo, useCallback } from 'react';
import { ScrollText, Download } from 'lucide-react';
import { SessionState } from './types';
import { createClaimEngine } from './core/engine';
import { FixSource } from './core/controller';
import { BrowserFixSource } from './services/geolocation';
import { TerritoryClient } from './services/territoryClient';
import { ClaimLogger } from './core/logger';
import { useTrackingSession } from './hooks/useTrackingSession';
import TrackingOverlay from './components/TrackingOverlay';

interface ClaimAppProps {
  userId: string;
  sessionToken?: string;
  apiBaseUrl?: string;
  /** Modo de teste: leituras do simulador em vez do GPS. */
  fixSource?: FixSource;
  client?: TerritoryClient;
}

const App: React.FC<ClaimAppProps> = ({ userId, sessionToken, apiBaseUrl, fixSource, client }) => {
  const engine = useMemo(() => {
    const logger = new ClaimLogger();
    return createClaimEngine({
      userId,
      logger,
      fixSource: fixSource ?? new BrowserFixSource(logger),
      client: client ?? new TerritoryClient({ baseUrl: apiBaseUrl, sessionToken })
    });
  }, [userId, sessionToken, apiBaseUrl, fixSource, client]);

  const snapshot = useTrackingSession(engine.session);
  const [isSubmitting, setIsSubmitting] = useState(false);
  const [showLog, setShowLog] = useState(false);

  useEffect(() => {
    engine.controller.connect();
    engine.roster.startPolling();
    return () => engine.dispose();
  }, [engine]);

  const handleSubmit = useCallback(async () => {
    setIsSubmitting(true);
    try {
      const saved = await engine.submitClaim();
      if (saved) engine.controller.reset();
    } catch (e) {
      console.error('[UPLOAD] Erro ao salvar território', e);
      alert('Não foi possível salvar o território. Tente novamente.');
    } finally {
      setIsSubmitting(false);
    }
  }, [engine]);

  const handleExportLog = useCallback(() => {
    const blob = new Blob([engine.logger.export()], { type: 'text/plain' });
    const url = URL.createObjectURL(blob);
    const a = document.createElement('a');
    a.href = url;
    a.download = `claim-log-${Date.now()}.txt`;
    a.click();
    URL.revokeObjectURL(url);
  }, [engine]);

  return (
    <div className="h-full w-full bg-black overflow-hidden relative text-white">
      {snapshot.state === SessionState.IDLE ? (
        <div className="absolute inset-x-0 bottom-10 p-6 flex flex-col gap-4 z-[1000]">
          <button
            onClick={() => engine.controller.start()}
            className="w-full bg-blue-600 hover:bg-blue-500 py-7 rounded-[2.5rem] font-black text-2xl italic uppercase active:scale-95 transition-all border-b-[6px] border-blue-800 text-white"
          >
            INICIAR CONQUISTA
          </button>
        </div>
      ) : (
        <TrackingOverlay
          snapshot={snapshot}
          onStop={() => engine.controller.stop()}
          onResume={() => engine.controller.resume()}
          onReset={() => engine.controller.reset()}
          onSubmit={() => void handleSubmit()}
          isSubmitting={isSubmitting}
        />
      )}

      <div className="absolute top-4 right-4 flex gap-2 z-[1100]">
        <button onClick={() => setShowLog(v => !v)} aria-label="Log" className="p-3 bg-white/5 rounded-2xl border border-white/10">
          <ScrollText size={16} />
        </button>
        <button onClick={handleExportLog} aria-label="Exportar log" className="p-3 bg-white/5 rounded-2xl border border-white/10">
          <Download size={16} />
        </button>
      </div>

      {showLog && (
        <pre className="absolute inset-x-4 top-20 max-h-64 overflow-auto bg-black/90 text-[10px] p-3 rounded-xl border border-white/10 z-[1100]">
          {engine.logger.toText()}
        </pre>
      )}
    </div>
  );
};

export default App;
