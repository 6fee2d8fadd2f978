import type { CpuInfo } from 'os';
import {
  cpuPercentBetween,
  roundTo2,
  sumCpuTimes,
  usedPercent,
} from './usage.util';

const cpu = (user: number, idle: number): CpuInfo => ({
  model: 'test-cpu',
  speed: 1000,
  times: { user, nice: 0, sys: 0, idle, irq: 0 },
});

describe('usage utils', () => {
  it('should sum times across cores', () => {
    expect(sumCpuTimes([cpu(100, 300), cpu(50, 50)])).toEqual({
      idle: 350,
      total: 500,
    });
  });

  it('should compute busy share of the elapsed interval', () => {
    const start = { idle: 1000, total: 2000 };
    const end = { idle: 1300, total: 2400 };

    // 400 elapsed, 300 idle -> 25% busy
    expect(cpuPercentBetween(start, end)).toBe(25);
  });

  it('should report 0 when no time elapsed', () => {
    const times = { idle: 10, total: 20 };
    expect(cpuPercentBetween(times, times)).toBe(0);
  });

  it('should compute used percent and guard a zero total', () => {
    expect(usedPercent(3, 4)).toBe(75);
    expect(usedPercent(1, 0)).toBe(0);
  });

  it('should round to two decimals', () => {
    expect(roundTo2(33.33333)).toBe(33.33);
    expect(roundTo2(66.666)).toBe(66.67);
  });
});
