/**
 * Public type definitions.
 */

export type {
  AppConfig,
  TimeoutsConfig,
  ProbeConfig,
  EndpointConfig,
  ReleaseConfig,
  PluginConfig,
  LogConfig,
  BuilderConfig,
} from './config.js';

export type { ImageLayout, ImageValidation } from './image.js';

export type { ProbeVerdict, Strategy, VerificationProbe } from './pipeline.js';

export type { ErrorKind, OperationResult } from './result.js';
