import { Module } from '@nestjs/common';
import { AnalysesController, HistoryController, HealthController } from '../controllers';

@Module({
  controllers: [AnalysesController, HistoryController, HealthController],
})
export class ApiModule {}
