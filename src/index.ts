export * from './types/dataset';
export * from './config/config';
export * from './utils/errors';
export { logger, LogLevel } from './utils/logger';
export type { ConsoleStream } from './utils/logger';
export * from './dataset/imageEnumerator';
export * from './providers';
export * from './providers/errorClassifier';
export * from './providers/rateLimiter';
export * from './captioning/backoff';
export * from './captioning/promptBuilder';
export * from './captioning/captionRequester';
export * from './captioning/workerPool';
export * from './qualification/qualityScorer';
export * from './qualification/validationFilter';
export * from './storage/checkpointStore';
export * from './export/datasetExporter';
export * from './pipeline/annotationPipeline';
