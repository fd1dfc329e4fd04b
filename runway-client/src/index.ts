export { RunwayApiClient } from './apiClient.js';
export type { HttpMethod, RequestOptions, RunwayApiClientOptions } from './apiClient.js';
export { VideoGenerator } from './videoGenerator.js';
export type { SleepFn, VideoGeneratorOptions } from './videoGenerator.js';
export { DEFAULT_BASE_URL, loadDotenv, loadRuntimeConfig } from './config.js';
export type { RuntimeConfig } from './config.js';
export { createLogger, logger } from './logger.js';
export type { Logger } from './logger.js';
export * from './errors.js';
export * from './types.js';
