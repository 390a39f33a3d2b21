import { Module } from '@nestjs/common';
import { DatabaseModule } from '@sheetwise/database';
import { ProgressModule } from '../progress/progress.module';
import { WatchdogService } from './watchdog.service';

@Module({
  imports: [DatabaseModule.forFeature(), ProgressModule],
  providers: [WatchdogService],
  exports: [WatchdogService],
})
export class WatchdogModule {}
