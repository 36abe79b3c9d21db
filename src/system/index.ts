export * from './types';
export * from './MetricsCollector';
