import { Module } from '@nestjs/common';
import { SystemController } from './system.controller';
import { SystemInfoService } from './system-info.service';

@Module({
  controllers: [SystemController],
  providers: [SystemInfoService],
})
export class SystemModule {}
