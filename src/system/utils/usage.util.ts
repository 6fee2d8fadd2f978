import type { CpuInfo } from 'os';

export interface CpuTimes {
  idle: number;
  total: number;
}

/** os.cpus() 전체 코어의 누적 시간 합 */
export function sumCpuTimes(cpus: CpuInfo[]): CpuTimes {
  return cpus.reduce<CpuTimes>(
    (acc, cpu) => {
      const { user, nice, sys, idle, irq } = cpu.times;
      return {
        idle: acc.idle + idle,
        total: acc.total + user + nice + sys + idle + irq,
      };
    },
    { idle: 0, total: 0 },
  );
}

/**
 * 두 시점 사이의 CPU 사용률 (%).
 * 구간 동안 시간이 흐르지 않았으면 0.
 */
export function cpuPercentBetween(start: CpuTimes, end: CpuTimes): number {
  const total = end.total - start.total;
  if (total <= 0) {
    return 0;
  }
  const idle = end.idle - start.idle;
  return clampPercent(((total - idle) / total) * 100);
}

export function usedPercent(used: number, total: number): number {
  if (total <= 0) {
    return 0;
  }
  return clampPercent((used / total) * 100);
}

export function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

function clampPercent(value: number): number {
  return Math.min(100, Math.max(0, value));
}
