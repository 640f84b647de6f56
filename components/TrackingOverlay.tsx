// Arquivo: components/TrackingOverlay.tsx

import React from 'react';
import { Timer, Navigation, Gauge, Crosshair, AlertTriangle, CheckCircle2, XCircle } from 'lucide-react';
import { ReasonCode, SessionSnapshot, SessionState, WarningLevel } from '../types';
import { WARNING_COLORS } from '../constants';
import { formatArea, formatDistance, formatDuration } from '../utils/format';

export const REASON_LABELS: Record<ReasonCode, string> = {
  InsufficientPoints: 'Poucos pontos registrados',
  InsufficientDistance: 'Distância percorrida insuficiente',
  PathNotClosed: 'Volte ao ponto de partida para fechar o loop',
  SelfIntersection: 'O percurso cruza a si mesmo',
  InsufficientArea: 'Área conquistada pequena demais',
  PointInForeignTerritory: 'Você está dentro de um território alheio',
  PathCrossesForeignTerritory: 'O percurso atravessa um território alheio',
  TooCloseToForeignTerritory: 'Perto demais de um território alheio'
};

interface TrackingOverlayProps {
  snapshot: SessionSnapshot;
  onStop: () => void;
  onResume?: () => void;
  onReset?: () => void;
  onSubmit?: () => void;
  isSubmitting?: boolean;
}

const TrackingOverlay: React.FC<TrackingOverlayProps> = ({ snapshot, onStop, onResume, onReset, onSubmit, isSubmitting }) => {
  const levelColor = WARNING_COLORS[snapshot.warningLevel];
  const banner = snapshot.collisionMessage ?? snapshot.speedWarning;
  const bannerColor = snapshot.collisionMessage ? levelColor : WARNING_COLORS[WarningLevel.WARNING];
  const failure = snapshot.validation?.failureReason ?? null;

  return (
    <div className="absolute inset-0 p-6 pointer-events-none flex flex-col items-center z-20">
      <div className="mt-16 text-center">
        <div className="text-[72px] font-[900] tracking-tighter leading-none" style={{ color: levelColor }}>
          {formatDistance(snapshot.distanceMeters)}
        </div>
        <div className="text-[11px] font-black uppercase text-white/40 tracking-[0.4em] mt-1">Percorrido</div>
      </div>

      {banner && (
        <div
          role="alert"
          className="mt-6 bg-black/80 backdrop-blur-md px-5 py-3 rounded-2xl border text-xs font-black uppercase tracking-widest flex items-center gap-2"
          style={{ borderColor: bannerColor, color: bannerColor }}
        >
          <AlertTriangle size={14} /> {banner}
        </div>
      )}

      <div className="mt-auto w-full flex flex-col gap-4 items-center mb-12 pointer-events-auto">
        <div className="flex gap-2 w-full max-w-sm">
          <div className="bg-black/80 backdrop-blur-3xl px-4 py-4 rounded-[24px] border border-white/10 flex-1 flex flex-col items-center">
            <div className="text-[10px] font-black uppercase text-white/30 mb-1 tracking-widest flex items-center gap-1"><Timer size={10} /> Tempo</div>
            <div className="text-2xl font-[900]" data-testid="duration">{formatDuration(snapshot.durationSeconds)}</div>
          </div>
          <div className="bg-black/80 backdrop-blur-3xl px-4 py-4 rounded-[24px] border border-white/10 flex-1 flex flex-col items-center">
            <div className="text-[10px] font-black uppercase text-white/30 mb-1 tracking-widest flex items-center gap-1"><Gauge size={10} /> km/h</div>
            <div className={`text-2xl font-[900] ${snapshot.isOverSpeed ? 'text-orange-500' : ''}`}>{snapshot.speedKmh.toFixed(0)}</div>
          </div>
          <div className="bg-black/80 backdrop-blur-3xl px-4 py-4 rounded-[24px] border border-white/10 flex-1 flex flex-col items-center">
            <div className="text-[10px] font-black uppercase text-white/30 mb-1 tracking-widest flex items-center gap-1"><Navigation size={10} /> Pontos</div>
            <div className="text-2xl font-[900]" data-testid="point-count">{snapshot.pointCount}</div>
          </div>
        </div>

        {snapshot.state === SessionState.TRACKING && (
          <>
            <div className="bg-black/40 backdrop-blur-md px-6 py-3 rounded-full border border-white/10 text-[10px] font-black uppercase tracking-widest flex items-center gap-2">
              <Crosshair size={14} />
              {snapshot.hasLiveSelfIntersection
                ? 'O percurso cruzou a si mesmo'
                : snapshot.isClosed
                  ? 'Loop fechado, finalize para conquistar'
                  : 'Volte ao ponto de partida para fechar o loop'}
            </div>
            <button
              onClick={onStop}
              className={`w-full max-w-sm active:scale-95 transition-all text-white font-[900] py-6 rounded-[32px] text-xl uppercase italic ${snapshot.canFinalize ? 'bg-emerald-600' : 'bg-red-600'}`}
            >
              {snapshot.canFinalize ? 'FINALIZAR CONQUISTA' : 'ENCERRAR'}
            </button>
          </>
        )}

        {snapshot.state === SessionState.VALID && snapshot.validation && (
          <>
            <div className="text-emerald-400 font-black uppercase text-sm flex items-center gap-2">
              <CheckCircle2 size={16} /> Território válido: {formatArea(snapshot.validation.computedAreaSqm)}
            </div>
            {onSubmit && (
              <button
                onClick={onSubmit}
                disabled={isSubmitting}
                className={`w-full max-w-sm bg-blue-600 active:scale-95 transition-all text-white font-[900] py-6 rounded-[32px] text-xl uppercase italic ${isSubmitting ? 'opacity-50' : ''}`}
              >
                {isSubmitting ? 'Enviando...' : 'SALVAR TERRITÓRIO'}
              </button>
            )}
          </>
        )}

        {snapshot.state === SessionState.INVALID && (
          <>
            <div className="text-red-400 font-black uppercase text-sm flex items-center gap-2" data-testid="failure">
              <XCircle size={16} /> {failure ? REASON_LABELS[failure] : 'Território inválido'}
            </div>
            <div className="flex gap-2 w-full max-w-sm">
              {onResume && snapshot.stopReason === 'manual' && (
                <button onClick={onResume} className="flex-1 bg-white/10 text-white font-black py-4 rounded-[24px] uppercase">Continuar</button>
              )}
              {onReset && (
                <button onClick={onReset} className="flex-1 bg-red-600 text-white font-black py-4 rounded-[24px] uppercase">Descartar</button>
              )}
            </div>
          </>
        )}
      </div>
    </div>
  );
};

export default TrackingOverlay;
