export { AnalysesController } from './analyses.controller';
export { HistoryController } from './history.controller';
export { HealthController } from './health.controller';
