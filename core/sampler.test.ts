import { describe, it, expect } from 'vitest';
import { PathSampler } from './sampler';
import { at } from '../test/helpers';

describe('PathSampler', () => {
  it('grava sempre o primeiro ponto', () => {
    const sampler = new PathSampler(10);
    expect(sampler.offer(at(0, 0))).toEqual({ recorded: true, distanceFromLast: 0 });
    expect(sampler.path).toHaveLength(1);
  });

  it('descarta pontos a menos de 10 m do último vértice', () => {
    const sampler = new PathSampler(10);
    sampler.offer(at(0, 0));
    const result = sampler.offer(at(9, 0));
    expect(result.recorded).toBe(false);
    expect(result.distanceFromLast).toBeCloseTo(9, 3);
    expect(sampler.path).toHaveLength(1);
  });

  it('acumula a distância dos vértices gravados', () => {
    const sampler = new PathSampler(10);
    sampler.offer(at(0, 0));
    sampler.offer(at(12, 0));
    sampler.offer(at(15, 0));
    sampler.offer(at(24, 0));
    expect(sampler.path).toHaveLength(3);
    expect(sampler.totalDistance).toBeCloseTo(24, 3);
  });

  it('incrementa a versão a cada mudança', () => {
    const sampler = new PathSampler(10);
    sampler.offer(at(0, 0));
    sampler.offer(at(3, 0));
    expect(sampler.version).toBe(1);
    sampler.clear();
    expect(sampler.version).toBe(2);
    expect(sampler.path).toHaveLength(0);
    expect(sampler.totalDistance).toBe(0);
    expect(sampler.lastPoint).toBeNull();
  });
});
