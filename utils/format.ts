// Arquivo: utils/format.ts

/** Duração em mm:ss (minutos sem limite: 75:05). */
export const formatDuration = (totalSeconds: number): string => {
  const s = Math.max(0, Math.floor(totalSeconds));
  const mins = Math.floor(s / 60);
  const secs = s % 60;
  return `${mins.toString().padStart(2, '0')}:${secs.toString().padStart(2, '0')}`;
};

/** "850 m" abaixo de 1 km, "1.2 km" a partir dele. */
export const formatDistance = (meters: number): string => {
  if (meters < 1000) return `${Math.floor(Math.max(0, meters))} m`;
  return `${(meters / 1000).toFixed(1)} km`;
};

export const formatArea = (sqm: number): string => `${Math.round(sqm).toLocaleString('pt-BR')} m²`;
