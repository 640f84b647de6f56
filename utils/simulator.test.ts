import { describe, it, expect, vi, afterEach } from 'vitest';
import { calculateDistance } from '../core/geo';
import { SimulatedFixSource, buildRouteFixes, moveTowardsMeters, offsetMeters } from './simulator';
import { ORIGIN } from '../test/helpers';
import { Fix } from '../types';

describe('moveTowardsMeters', () => {
  const target = offsetMeters(ORIGIN, 100, 0);

  it('anda a distância pedida', () => {
    const next = moveTowardsMeters(ORIGIN, target, 30);
    expect(calculateDistance(ORIGIN, next)).toBeCloseTo(30, 3);
    expect(calculateDistance(next, target)).toBeCloseTo(70, 3);
  });

  it('não passa do destino', () => {
    expect(moveTowardsMeters(ORIGIN, target, 500)).toEqual(target);
  });
});

describe('buildRouteFixes', () => {
  it('gera leituras espaçadas pela velocidade', () => {
    const fixes = buildRouteFixes([ORIGIN, offsetMeters(ORIGIN, 10, 0)], { speedMps: 2, intervalMs: 2500, startTime: 1000 });

    expect(fixes).toHaveLength(3);
    expect(fixes.map(f => f.timestamp)).toEqual([1000, 3500, 6000]);
    expect(calculateDistance(fixes[1].coordinate, ORIGIN)).toBeCloseTo(5, 3);
  });

  it('retorna vazio sem waypoints', () => {
    expect(buildRouteFixes([], { speedMps: 1, intervalMs: 1000 })).toEqual([]);
  });
});

describe('SimulatedFixSource', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('reproduz as leituras no ritmo pedido', () => {
    vi.useFakeTimers();
    const source = new SimulatedFixSource();
    const received: Fix[] = [];
    const onDone = vi.fn();
    source.subscribe(fix => received.push(fix));

    const fixes = buildRouteFixes([ORIGIN, offsetMeters(ORIGIN, 10, 0)], { speedMps: 2, intervalMs: 2500 });
    source.play(fixes, 1000, onDone);

    vi.advanceTimersByTime(2000);
    expect(received).toHaveLength(2);

    vi.advanceTimersByTime(2000);
    expect(received).toHaveLength(3);
    expect(onDone).toHaveBeenCalledTimes(1);
    expect(source.isPlaying).toBe(false);
  });

  it('cancelar a assinatura interrompe a entrega', () => {
    const source = new SimulatedFixSource();
    const listener = vi.fn();
    const unsubscribe = source.subscribe(listener);
    unsubscribe();
    source.emit({ coordinate: ORIGIN, timestamp: 0 });
    expect(listener).not.toHaveBeenCalled();
  });
});
