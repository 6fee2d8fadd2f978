import { Controller, Get, HttpCode, HttpStatus } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { AppService } from './app.service';
import type { HealthResponse, HelloResponse, RootResponse } from './app.service';

@ApiTags('app')
@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get('/')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'API information' })
  getRoot(): RootResponse {
    return this.appService.getRoot();
  }

  @Get('/health')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Liveness probe' })
  getHealth(): HealthResponse {
    return this.appService.getHealth();
  }

  @Get('/hello')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Static greeting' })
  getHello(): HelloResponse {
    return this.appService.getHello();
  }
}
