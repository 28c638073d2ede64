import { Module } from '@nestjs/common';
import { SystemController } from './system.controller';
import { RouteCatalog } from './route-catalog';

@Module({
  controllers: [SystemController],
  providers: [RouteCatalog],
})
export class SystemModule {}
