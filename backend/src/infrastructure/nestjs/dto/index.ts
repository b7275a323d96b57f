export * from './analysis.dto';
