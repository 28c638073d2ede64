import { Global, Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Log } from './logs.entity';
import { SystemLoggingService } from './system-logging.service';

@Global()
@Module({
  imports: [TypeOrmModule.forFeature([Log])],
  providers: [SystemLoggingService],
  exports: [SystemLoggingService],
})
export class LogsModule {}
