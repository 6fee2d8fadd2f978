import { Inject, Injectable } from '@nestjs/common';
import * as os from 'os';
import { statfs } from 'fs/promises';
import { setTimeout as sleep } from 'timers/promises';
import { appConfig } from '../config/app.config';
import type { AppConfig } from '../config/app.config';
import {
  cpuPercentBetween,
  roundTo2,
  sumCpuTimes,
  usedPercent,
} from './utils/usage.util';
import type { SystemInfoResponseDto } from './dtos';

@Injectable()
export class SystemInfoService {
  constructor(
    @Inject(appConfig.KEY)
    private readonly config: AppConfig,
  ) {}

  /**
   * 호스트 자원 사용률.
   * CPU 는 cpuSampleIntervalMs 동안 측정하므로 그만큼 응답이 지연된다.
   */
  async getSystemInfo(): Promise<SystemInfoResponseDto> {
    const [cpuPercent, diskPercent] = await Promise.all([
      this.sampleCpuPercent(),
      this.readDiskPercent(),
    ]);

    const totalMemory = os.totalmem();

    return {
      cpu_percent: roundTo2(cpuPercent),
      memory_percent: roundTo2(
        usedPercent(totalMemory - os.freemem(), totalMemory),
      ),
      disk_percent: roundTo2(diskPercent),
      hostname: this.config.hostname,
      environment: this.config.environment,
    };
  }

  private async sampleCpuPercent(): Promise<number> {
    const start = sumCpuTimes(os.cpus());
    await sleep(this.config.cpuSampleIntervalMs);
    return cpuPercentBetween(start, sumCpuTimes(os.cpus()));
  }

  private async readDiskPercent(): Promise<number> {
    const stats = await statfs('/');
    const used = (stats.blocks - stats.bfree) * stats.bsize;
    const available = stats.bavail * stats.bsize;
    return usedPercent(used, used + available);
  }
}
