/**
 * Tracker Relay — Type Exports
 *
 * Re-exports all types from the types module.
 */

// Trackers
export type {
  TrackerScheme,
  TrackerEndpoint,
  ProbeResult,
  CheckResult,
  RankedSelection,
} from './tracker';

// Sources
export type {
  SourceFailureKind,
  SourceFailure,
  SourceOutcome,
  SourceResult,
  AggregateResult,
} from './source';

// Publishing
export type {
  RemoteArtifact,
  RateLimitState,
  PublishFailureKind,
  PublishFailure,
  PublishOutcome,
  PublishOutcomeKind,
} from './publish';

// Configuration
export type {
  LogLevel,
  LogFormat,
  EnvInput,
  ParsedEnv,
  GitHubTarget,
  ArtifactPaths,
  RetryPolicy,
  AppConfig,
} from './config';
export { EnvSchema, LogLevelSchema, LogFormatSchema } from './config';
