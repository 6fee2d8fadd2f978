import { Controller, Get, HttpCode, HttpStatus } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { SystemInfoService } from './system-info.service';
import type { SystemInfoResponseDto } from './dtos';

@ApiTags('system')
@Controller()
export class SystemController {
  constructor(private readonly systemInfoService: SystemInfoService) {}

  /**
   * @tag system
   * @summary 호스트 CPU / 메모리 / 디스크 사용률
   */
  @Get('/info')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Host CPU, memory and disk utilisation' })
  @ApiResponse({ status: HttpStatus.OK, description: '자원 사용률' })
  async getSystemInfo(): Promise<SystemInfoResponseDto> {
    return this.systemInfoService.getSystemInfo();
  }
}
