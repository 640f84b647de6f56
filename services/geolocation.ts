// Arquivo: services/geolocation.ts

import { FixSource } from '../core/controller';
import { ClaimLogger } from '../core/logger';
import { Fix } from '../types';

const toFix = (pos: GeolocationPosition): Fix => ({
  coordinate: { latitude: pos.coords.latitude, longitude: pos.coords.longitude },
  timestamp: pos.timestamp,
  horizontalAccuracy: pos.coords.accuracy
});

/**
 * Leituras do GPS do navegador (alta precisão). Cada assinatura abre seu próprio watch.
 */
export class BrowserFixSource implements FixSource {
  constructor(
    private readonly logger: ClaimLogger,
    private readonly geolocation: Geolocation | undefined = typeof navigator === 'undefined' ? undefined : navigator.geolocation
  ) {}

  subscribe(listener: (fix: Fix) => void): () => void {
    const geo = this.geolocation;
    if (!geo) {
      this.logger.error('GPS', 'Geolocalização indisponível neste dispositivo');
      return () => {};
    }

    const onError = (err: GeolocationPositionError) => {
      this.logger.warn('GPS', `Erro de localização (${err.code}): ${err.message}`);
    };

    geo.getCurrentPosition(pos => listener(toFix(pos)), onError, {
      enableHighAccuracy: true,
      timeout: 15000,
      maximumAge: 0
    });
    const watchId = geo.watchPosition(pos => listener(toFix(pos)), onError, {
      enableHighAccuracy: true,
      timeout: 20000,
      maximumAge: 1000
    });

    return () => geo.clearWatch(watchId);
  }
}
