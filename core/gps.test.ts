import { describe, it, expect } from 'vitest';
import { DEFAULT_CLAIM_CONFIG } from './config';
import { SpeedFilter, calculateSpeedKmh, classifyFix } from './gps';
import { Fix } from '../types';
import { at } from '../test/helpers';

const fix = (north: number, timestamp: number): Fix => ({ coordinate: at(north, 0), timestamp });

describe('calculateSpeedKmh', () => {
  it('converte m/s para km/h', () => {
    expect(calculateSpeedKmh(fix(0, 0), fix(50, 10000))).toBeCloseTo(18, 5);
  });

  it('retorna null sem intervalo de tempo', () => {
    expect(calculateSpeedKmh(fix(0, 1000), fix(10, 1000))).toBeNull();
  });
});

describe('classifyFix', () => {
  it('aceita a primeira leitura sem medir velocidade', () => {
    const result = classifyFix(fix(0, 0), null, 0, DEFAULT_CLAIM_CONFIG);
    expect(result).toEqual({
      kind: 'normal',
      speedKmh: 0,
      consecutiveOverspeedCount: 0,
      accepted: true,
      updatesLastRecorded: true
    });
  });

  it('trata salto acima de 50 km/h como deriva sem tocar no contador', () => {
    // 100 m em 6 s = 60 km/h
    const result = classifyFix(fix(100, 6000), fix(0, 0), 1, DEFAULT_CLAIM_CONFIG);
    expect(result.kind).toBe('drift');
    expect(result.consecutiveOverspeedCount).toBe(1);
    expect(result.accepted).toBe(false);
    expect(result.updatesLastRecorded).toBe(false);
  });

  it('zera o contador numa leitura dentro do limite', () => {
    const result = classifyFix(fix(10, 5000), fix(0, 0), 1, DEFAULT_CLAIM_CONFIG);
    expect(result.kind).toBe('normal');
    expect(result.consecutiveOverspeedCount).toBe(0);
  });
});

describe('SpeedFilter', () => {
  it('ignora deriva de 60 km/h e mantém a referência anterior', () => {
    const filter = new SpeedFilter(DEFAULT_CLAIM_CONFIG);
    const first = fix(0, 0);
    filter.evaluate(first);

    const result = filter.evaluate(fix(100, 6000));

    expect(result.kind).toBe('drift');
    expect(filter.consecutiveOverspeedCount).toBe(0);
    expect(filter.lastRecordedFix).toBe(first);
    expect(filter.speedWarning).toBeNull();
  });

  it('avisa após duas leituras seguidas a 20 km/h', () => {
    const filter = new SpeedFilter(DEFAULT_CLAIM_CONFIG);
    filter.evaluate(fix(0, 0));

    // 50 m em 9 s = 20 km/h
    expect(filter.evaluate(fix(50, 9000)).kind).toBe('overspeedPending');
    expect(filter.isOverSpeed).toBe(false);

    const second = filter.evaluate(fix(100, 18000));
    expect(second.kind).toBe('overspeedWarning');
    expect(second.consecutiveOverspeedCount).toBe(2);
    expect(filter.speedWarning).toBe('Movimento rápido demais (20 km/h), continue a pé');
  });

  it('encerra após duas leituras seguidas a 35 km/h', () => {
    const filter = new SpeedFilter(DEFAULT_CLAIM_CONFIG);
    filter.evaluate(fix(0, 0));

    // 70 m em 7,2 s = 35 km/h
    expect(filter.evaluate(fix(70, 7200)).kind).toBe('overspeedWarning');
    const second = filter.evaluate(fix(140, 14400));

    expect(second.kind).toBe('fatal');
    expect(filter.speedWarning).toBe('Velocidade excessiva (35 km/h), rastreamento encerrado');
  });

  it('limpa o aviso quando a velocidade volta ao normal', () => {
    const filter = new SpeedFilter(DEFAULT_CLAIM_CONFIG);
    filter.evaluate(fix(0, 0));
    filter.evaluate(fix(50, 9000));
    filter.evaluate(fix(100, 18000));

    filter.evaluate(fix(110, 28000));

    expect(filter.speedWarning).toBeNull();
    expect(filter.consecutiveOverspeedCount).toBe(0);
  });

  it('reset esquece a referência', () => {
    const filter = new SpeedFilter(DEFAULT_CLAIM_CONFIG);
    filter.evaluate(fix(0, 0));
    filter.reset();
    expect(filter.lastRecordedFix).toBeNull();
    expect(filter.speedKmh).toBe(0);
  });
});
