import { Module } from '@nestjs/common';
import { AppConfigModule, CoreModule, ApiModule, WorkersModule } from './infrastructure';

@Module({
  imports: [AppConfigModule, CoreModule, ApiModule, WorkersModule],
})
export class AppModule {}
