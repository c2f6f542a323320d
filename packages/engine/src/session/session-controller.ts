import {
  findChromiumBinary,
  IdentityApplyError,
  launchBrowser,
  type BrowserSurface,
  type LaunchRequest,
} from '@tubeveil/browser-driver';
import { createLogger } from '@tubeveil/logger';
import { BlockDetector } from '../anti-blocking/block-detector.js';
import { NavigationRetryStrategy } from '../anti-blocking/retry-strategy.js';
import type { BlockReason, NavigationFailureClass } from '../anti-blocking/types.js';
import { BehaviorSimulator } from '../behavior/behavior-simulator.js';
import type { EngineConfig } from '../config/engine-config.js';
import { DownloadOrchestrator, type DownloadFormat } from '../download/download-orchestrator.js';
import { EvasionInjector } from '../evasion/evasion-injector.js';
import { buildLaunchArgs, IGNORED_DEFAULT_ARGS } from '../evasion/launch-flags.js';
import { ExtractionPipeline } from '../extraction/extraction-pipeline.js';
import { extractResourceId, watchUrl } from '../extraction/resource-id.js';
import type { PageReader } from '../extraction/page-reader.js';
import { IdentityPool, toContextIdentity } from '../identity/identity-pool.js';
import { EngineMetrics } from '../observability/metrics.js';
import { parseProxyUrl } from '../proxy/proxy-list.js';
import { ProxyRegistry, toLaunchProxy } from '../proxy/proxy-registry.js';
import type { ProxyEndpoint } from '../proxy/types.js';
import {
  BrowserLaunchError,
  EngineError,
  errorMessage,
  InvalidResourceError,
  NavigationError,
} from '../utils/errors.js';
import { mathRandom, sleep as defaultSleep, type RandomSource, type Sleep } from '../utils/random.js';
import type {
  DownloadResponse,
  InfoError,
  InfoErrorCode,
  InfoResponse,
  ResponseMetadata,
} from './responses.js';
import { RotationPolicy, type RotationReason } from './rotation-policy.js';
import { RotationWorker } from './rotation-worker.js';
import { Session } from './session.js';
import { SessionLock } from './session-lock.js';
import type { SessionInfo, SessionLifecycle } from './types.js';

const logger = createLogger('SessionController');

type RotationTrigger = RotationReason | 'continuous' | 'blocked' | 'manual';

type SessionControllerDeps = {
  identityPool: IdentityPool;
  proxyRegistry: ProxyRegistry;
  rotationPolicy: RotationPolicy;
  behavior: BehaviorSimulator;
  evasion: EvasionInjector;
  pipeline: ExtractionPipeline;
  downloader: DownloadOrchestrator;
  blockDetector: BlockDetector;
  retryStrategy: NavigationRetryStrategy;
  metrics: EngineMetrics;
  launch: (request: LaunchRequest) => Promise<BrowserSurface>;
  findBinary: (override: string | undefined) => string | undefined;
  rng: RandomSource;
  sleep: Sleep;
  now: () => number;
};

/** The page a navigation ended on, read under the session lock. */
type PageVisit = {
  videoId: string;
  reader: PageReader;
  blockReason?: BlockReason;
};

type DownloadParams = {
  url: string;
  outputPath: string;
  format: DownloadFormat;
  quality: string;
};

const SETTLE_SECONDS = { min: 3, max: 6 };
const POST_SCROLL_SECONDS = { min: 1, max: 2 };

function buildDeps(config: EngineConfig, overrides: Partial<SessionControllerDeps>): SessionControllerDeps {
  const rng = overrides.rng ?? mathRandom;
  const sleep = overrides.sleep ?? defaultSleep;
  const metrics = overrides.metrics ?? new EngineMetrics();

  return {
    identityPool: overrides.identityPool ?? new IdentityPool(undefined, rng),
    proxyRegistry:
      overrides.proxyRegistry ??
      new ProxyRegistry(
        {
          listUrl: config.proxy.listUrl,
          timeoutMs: config.proxy.refreshTimeoutMs,
          maxEntries: config.proxy.maxEntries,
        },
        rng,
      ),
    rotationPolicy: overrides.rotationPolicy ?? new RotationPolicy(config.rotation, rng),
    behavior: overrides.behavior ?? new BehaviorSimulator({ rng, sleep, metrics }),
    evasion: overrides.evasion ?? new EvasionInjector({ metrics }),
    pipeline: overrides.pipeline ?? new ExtractionPipeline(),
    downloader: overrides.downloader ?? new DownloadOrchestrator(config.download),
    blockDetector: overrides.blockDetector ?? new BlockDetector(),
    retryStrategy: overrides.retryStrategy ?? new NavigationRetryStrategy({}, rng),
    metrics,
    launch: overrides.launch ?? (request => launchBrowser(request)),
    findBinary: overrides.findBinary ?? (override => findChromiumBinary({ override })),
    rng,
    sleep,
    now: overrides.now ?? Date.now,
  };
}

const toInfoErrorCode = (error: unknown): InfoErrorCode => {
  if (!(error instanceof EngineError)) {
    return 'unexpected';
  }
  switch (error.code) {
    case 'invalid-resource':
    case 'browser-unavailable':
    case 'navigation-failed':
    case 'unexpected':
      return error.code;
    case 'invalid-state':
      return 'browser-unavailable';
  }
};

/**
 * Owns one browser session: its identity, proxy, rotation schedule and the
 * background rotation worker. Foreground calls and rotations are serialized
 * by the session lock. `getInfo` and `download` never throw; `start` throws
 * only BrowserLaunchError.
 */
export class SessionController {
  private readonly config: EngineConfig;
  private readonly deps: SessionControllerDeps;
  private readonly session: Session;
  private readonly lock: SessionLock;
  private readonly worker: RotationWorker;
  private surface: BrowserSurface | undefined;
  private startTask: Promise<void> | undefined;
  private closeTask: Promise<void> | undefined;

  constructor(config: EngineConfig, deps: Partial<SessionControllerDeps> = {}) {
    this.config = config;
    this.deps = buildDeps(config, deps);
    this.session = new Session(this.deps.now());
    this.lock = new SessionLock();
    this.worker = new RotationWorker({
      onWake: () => this.onWake(),
      wakeSeconds: config.rotation.wakeSeconds,
      joinTimeoutMs: config.rotation.joinTimeoutMs,
      rng: this.deps.rng,
      sleep: this.deps.sleep,
      onError: () => this.deps.metrics.increment('rotation.wake_failed'),
    });
  }

  get id(): string {
    return this.session.id;
  }

  get lifecycle(): SessionLifecycle {
    return this.session.lifecycle;
  }

  get info(): SessionInfo {
    return this.session.info;
  }

  get rotationActive(): boolean {
    return this.worker.running;
  }

  get metrics(): EngineMetrics {
    return this.deps.metrics;
  }

  /** Idempotent: concurrent callers share one launch. */
  start(): Promise<void> {
    this.startTask ??= this.initialize();
    return this.startTask;
  }

  /**
   * Loads the watch page for `url` and snapshots it. Throws
   * InvalidResourceError for URLs without a video id and NavigationError when
   * the retry budget is spent.
   */
  async navigate(url: string): Promise<PageVisit> {
    const videoId = extractResourceId(url);
    if (!videoId) {
      throw new InvalidResourceError(url);
    }

    return this.lock.runExclusive(async () => {
      const surface = this.requireActive();
      const visit = await this.visit(surface, videoId);

      if (this.config.continuousRotation) {
        await this.rotateLocked(['continuous']).catch((error: unknown) => {
          logger.warn('Rotation after navigation failed:', errorMessage(error));
        });
      }
      return visit;
    });
  }

  async getInfo(url: string): Promise<InfoResponse> {
    const startedAt = this.deps.now();

    try {
      const visit = await this.navigate(url);
      const { info, fallbacks } = this.deps.pipeline.extract(visit.reader, visit.videoId, url);
      this.deps.metrics.recordDuration('info', this.deps.now() - startedAt);

      return {
        success: true,
        info,
        metadata: this.metadata(startedAt, { fallbacks, blockReason: visit.blockReason }),
      };
    } catch (error) {
      return this.failure(error, startedAt);
    }
  }

  /**
   * Reads the video metadata, then hands the download to the external tool
   * with this session's cookies. The tool runs outside the session lock.
   */
  async download({ url, outputPath, format, quality }: DownloadParams): Promise<DownloadResponse> {
    const startedAt = this.deps.now();
    const infoResponse = await this.getInfo(url);
    if (!infoResponse.success) {
      return infoResponse;
    }

    const { info } = infoResponse;
    try {
      const cookies = await this.lock.runExclusive(async () => this.requireActive().cookies());
      const outcome = await this.deps.downloader.download(
        { url: watchUrl(info.id), outputPath, format, quality },
        cookies,
      );

      if (!outcome.ok) {
        this.deps.metrics.increment('download.failed');
        logger.warn(`Download failed (${outcome.code}):`, outcome.message);
        return {
          success: false,
          error: outcome.message,
          errorCode: outcome.code,
          info,
          metadata: this.metadata(startedAt),
        };
      }

      this.deps.metrics.increment('download.completed');
      return { success: true, info, outputPath: outcome.outputPath, metadata: this.metadata(startedAt) };
    } catch (error) {
      return { ...this.failure(error, startedAt), info };
    }
  }

  /** Replaces the identity on the live browser now, regardless of the policy. */
  async rotateIdentity(trigger: RotationTrigger = 'manual'): Promise<boolean> {
    return this.lock.runExclusive(() => this.rotateLocked([trigger]));
  }

  /**
   * Stops the worker (bounded join), releases the browser and logs the
   * session metrics. Safe to call before `start()` has finished and more
   * than once.
   */
  close(): Promise<void> {
    this.closeTask ??= this.shutdown();
    return this.closeTask;
  }

  private async initialize(): Promise<void> {
    const { deps, config } = this;
    this.session.transition('initializing');

    const identity = deps.identityPool.pick();
    const proxy = await this.chooseProxy();
    this.session.attach(identity, proxy, deps.rotationPolicy.initialState(deps.now()));

    const executablePath = deps.findBinary(config.chromePath);
    if (!executablePath) {
      logger.warn('No Chromium binary found, falling back to the playwright default');
    }

    const request: LaunchRequest = {
      headless: config.headless,
      executablePath,
      args: buildLaunchArgs({ antiDetection: config.antiDetection, container: config.container, identity }),
      ignoreDefaultArgs: config.antiDetection ? [...IGNORED_DEFAULT_ARGS] : [],
      proxy: toLaunchProxy(proxy),
      identity: toContextIdentity(identity),
      timeoutMs: config.launchTimeoutMs,
    };

    try {
      this.surface = await deps.launch(request);
    } catch (error) {
      this.session.transition('closed');
      deps.metrics.increment('browser.launch_failed');
      throw new BrowserLaunchError(`Failed to start browser session: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    await deps.evasion.applyAtLaunch(this.surface, identity);
    this.session.transition('active');
    logger.info('Session started', {
      sessionId: this.session.id,
      userAgent: identity.userAgent.slice(0, 50),
      proxy: proxy ? `${proxy.host}:${proxy.port}` : 'direct',
      evasionCatalog: deps.evasion.catalogVersion,
    });

    if (config.antiDetection) {
      this.worker.start();
    }
  }

  private async chooseProxy(): Promise<ProxyEndpoint | undefined> {
    const registry = this.deps.proxyRegistry;
    const { staticProxies, listUrl } = this.config.proxy;

    registry.add(
      staticProxies.flatMap(value => {
        const endpoint = parseProxyUrl(value);
        if (!endpoint) {
          logger.warn('Ignoring malformed proxy', value);
        }
        return endpoint ? [endpoint] : [];
      }),
    );

    if (registry.shouldRefresh() && listUrl) {
      await registry.refresh();
    }
    return registry.select();
  }

  private requireActive(): BrowserSurface {
    if (this.session.lifecycle !== 'active' || !this.surface) {
      throw new EngineError('invalid-state', `Browser session is ${this.session.lifecycle}`);
    }
    if (!this.surface.isConnected) {
      throw new EngineError('browser-unavailable', 'Browser is no longer connected');
    }
    return this.surface;
  }

  private async visit(surface: BrowserSurface, videoId: string): Promise<PageVisit> {
    const { deps, config } = this;
    const target = watchUrl(videoId);
    const attempts: Partial<Record<NavigationFailureClass, number>> = {};
    const startedAt = deps.now();

    await deps.evasion.applyBeforeNavigation(surface, this.session.identity);
    if (config.advancedEvasion) {
      await deps.behavior.simulateInteraction(surface);
    }

    for (;;) {
      this.session.recordRequest();
      deps.metrics.increment('navigation.requests');

      let finalUrl = target;
      try {
        finalUrl = (await surface.goto(target, config.navigationTimeoutMs)).finalUrl;
      } catch (error) {
        const errorClass = deps.retryStrategy.classify({ error, surfaceConnected: surface.isConnected });
        const attempt = attempts[errorClass] ?? 0;
        attempts[errorClass] = attempt + 1;
        const decision = deps.retryStrategy.decide(errorClass, attempt);
        deps.metrics.increment(`navigation.${errorClass}`);

        if (decision.action === 'fail') {
          throw new NavigationError(`Navigation failed: ${errorMessage(error)}`, errorClass, { cause: error });
        }
        if (decision.action === 'retry') {
          logger.warn(`Navigation ${errorClass}, retrying in ${Math.round(decision.delayMs)}ms`);
          await deps.sleep(decision.delayMs);
          continue;
        }
        logger.warn(`Navigation ${errorClass}, continuing with the partially loaded page`);
      }

      await this.settle(surface);
      const { html, reader } = await deps.pipeline.read(surface, config.selectorTimeoutMs);
      const blockReason = await deps.blockDetector.detect(finalUrl, html);

      if (blockReason) {
        deps.metrics.increment('navigation.blocked');
        const decision = deps.retryStrategy.decide('blocked', attempts.blocked ?? 0);
        attempts.blocked = (attempts.blocked ?? 0) + 1;

        if (decision.action === 'rotate' && (await this.rotateAfterBlock(decision.delayMs))) {
          await deps.evasion.applyBeforeNavigation(surface, this.session.identity);
          continue;
        }

        logger.warn(`Still blocked by ${blockReason}, reading the page as is`);
        deps.metrics.recordDuration('navigation', deps.now() - startedAt);
        return { videoId, reader, blockReason };
      }

      deps.metrics.recordDuration('navigation', deps.now() - startedAt);
      return { videoId, reader };
    }
  }

  private async rotateAfterBlock(delayMs: number): Promise<boolean> {
    logger.warn('Blocked, rotating identity before retrying');
    await this.deps.sleep(delayMs);
    try {
      return await this.rotateLocked(['blocked']);
    } catch (error) {
      logger.warn('Rotation after block failed:', errorMessage(error));
      return false;
    }
  }

  /** Settle pause, wait for `body`, nudge lazy-loaded sections, short pause. */
  private async settle(surface: BrowserSurface): Promise<void> {
    const { behavior } = this.deps;

    await behavior.pause(SETTLE_SECONDS.min, SETTLE_SECONDS.max);
    await surface.waitForSelector('body', this.config.selectorTimeoutMs);
    try {
      await behavior.scrollForLazyLoad(surface);
    } catch (error) {
      logger.debug('Lazy-load scroll failed:', errorMessage(error));
    }
    await behavior.pause(POST_SCROLL_SECONDS.min, POST_SCROLL_SECONDS.max);
  }

  /** Caller must hold the session lock. */
  private async rotateLocked(triggers: RotationTrigger[]): Promise<boolean> {
    const surface = this.surface;
    if (!surface || this.session.lifecycle !== 'active') {
      return false;
    }

    const { deps } = this;
    const startedAt = deps.now();
    this.session.transition('rotating');

    try {
      const identity = deps.identityPool.pick();

      try {
        await surface.applyIdentity(toContextIdentity(identity));
      } catch (error) {
        if (!(error instanceof IdentityApplyError)) {
          throw error;
        }
        deps.metrics.increment('rotation.partial');
        logger.warn('Identity partially applied, failed steps:', error.failedSteps.join(', '));
      }

      await deps.evasion.applyOnRotation(surface, identity);
      this.session.replaceIdentity(identity, deps.rotationPolicy.onRotated(deps.now()));

      deps.metrics.increment('rotation.completed');
      deps.metrics.recordDuration('rotation', deps.now() - startedAt);
      logger.info('Identity rotated', { triggers, userAgent: identity.userAgent.slice(0, 50) });
      return true;
    } catch (error) {
      deps.metrics.increment('rotation.failed');
      throw error;
    } finally {
      if (this.lifecycle === 'rotating') {
        this.session.transition('active');
      }
    }
  }

  private async onWake(): Promise<void> {
    await this.lock.runExclusive(async () => {
      if (this.session.lifecycle !== 'active') {
        return;
      }

      const reasons = this.deps.rotationPolicy.evaluate(this.session.rotation, this.deps.now());
      if (reasons.length > 0) {
        await this.rotateLocked(reasons);
      }
    });
  }

  private async shutdown(): Promise<void> {
    if (this.startTask) {
      await Promise.allSettled([this.startTask]);
    }

    const lifecycle = this.session.lifecycle;
    if (lifecycle === 'closed' || lifecycle === 'closing') {
      return;
    }
    if (lifecycle === 'uninitialized') {
      this.session.transition('closed');
      return;
    }

    this.session.transition('closing');
    await this.worker.stop();

    // An in-flight navigation keeps the handle until it returns.
    await this.lock.runExclusive(async () => {
      if (!this.surface) {
        return;
      }
      try {
        await this.surface.close();
      } catch (error) {
        logger.warn('Failed to close browser:', errorMessage(error));
      }
      this.surface = undefined;
    });

    this.session.transition('closed');
    this.deps.metrics.gauge('session.rotations', this.session.info.rotations);
    this.deps.metrics.log(logger);
    logger.info('Session closed', { sessionId: this.session.id });
  }

  private metadata(startedAt: number, extra: Partial<ResponseMetadata> = {}): ResponseMetadata {
    const metadata: ResponseMetadata = {
      duration: this.deps.now() - startedAt,
      sessionId: this.session.id,
    };
    if (extra.blockReason) metadata.blockReason = extra.blockReason;
    if (extra.fallbacks) metadata.fallbacks = extra.fallbacks;
    return metadata;
  }

  private failure(error: unknown, startedAt: number): InfoError {
    const errorCode = toInfoErrorCode(error);
    const message =
      error instanceof EngineError ? error.message : `Failed to extract video info: ${errorMessage(error)}`;

    this.deps.metrics.increment(`errors.${errorCode}`);
    if (errorCode === 'unexpected') {
      logger.error('Unexpected failure:', error);
    } else {
      logger.warn(message);
    }

    return { success: false, error: message, errorCode, metadata: this.metadata(startedAt) };
  }
}

export type { DownloadParams, PageVisit, RotationTrigger, SessionControllerDeps };
