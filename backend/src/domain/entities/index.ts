export * from './AnalysisJob';
