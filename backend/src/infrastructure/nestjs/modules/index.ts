export { CoreModule, DATABASE_TOKEN } from './core.module';
export { WorkersModule } from './workers.module';
export { ApiModule } from './api.module';
