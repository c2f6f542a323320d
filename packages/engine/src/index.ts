export {
  SessionController,
  type DownloadParams,
  type PageVisit,
  type RotationTrigger,
  type SessionControllerDeps
} from './session/session-controller.js';
export type {
  DownloadError,
  DownloadResponse,
  DownloadSuccess,
  InfoError,
  InfoErrorCode,
  InfoResponse,
  InfoSuccess,
  ResponseMetadata
} from './session/responses.js';
export type { SessionInfo, SessionLifecycle } from './session/types.js';
export {
  RotationPolicy,
  type RotationPolicySettings,
  type RotationReason,
  type RotationState
} from './session/rotation-policy.js';
export {
  loadEngineConfig,
  safeLoadEngineConfig,
  engineConfigSchema,
  type EngineConfig,
  type EngineConfigInput
} from './config/engine-config.js';
export {
  BrowserLaunchError,
  EngineError,
  InvalidResourceError,
  NavigationError,
  type EngineErrorCode
} from './utils/errors.js';
export { IdentityPool, toContextIdentity } from './identity/identity-pool.js';
export type { Identity, IdentityCatalog } from './identity/types.js';
export { ProxyRegistry } from './proxy/proxy-registry.js';
export type { ProxyEndpoint, ProxyRegistryConfig } from './proxy/types.js';
export { EvasionInjector, type InjectionReport } from './evasion/evasion-injector.js';
export { EVASION_CATALOG_VERSION, EVASION_PATCHES, type EvasionPatch } from './evasion/patches.js';
export { BehaviorSimulator } from './behavior/behavior-simulator.js';
export { ExtractionPipeline } from './extraction/extraction-pipeline.js';
export { extractResourceId, thumbnailUrl, watchUrl } from './extraction/resource-id.js';
export type { VideoInfo } from './extraction/types.js';
export {
  DownloadOrchestrator,
  type DownloadFailureCode,
  type DownloadFormat,
  type DownloadOutcome
} from './download/download-orchestrator.js';
export { formatNetscapeCookies } from './download/cookie-jar.js';
export { BlockDetector } from './anti-blocking/block-detector.js';
export { EngineMetrics, type MetricSnapshot } from './observability/metrics.js';
export { createSeededRandom, type RandomSource } from './utils/random.js';
