export interface SystemInfoResponseDto {
  /** 샘플링 구간 동안의 CPU 사용률 (소수점 2자리) */
  cpu_percent: number;
  memory_percent: number;
  /** 루트 파일시스템 사용률 */
  disk_percent: number;
  hostname: string;
  environment: string;
}
