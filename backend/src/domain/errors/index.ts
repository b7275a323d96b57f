export * from './PipelineErrors';
