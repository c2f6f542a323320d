import type { BrowserSurface } from '@tubeveil/browser-driver';
import { createLogger } from '@tubeveil/logger';
import type { Identity } from '../identity/types.js';
import type { EngineMetrics } from '../observability/metrics.js';
import { errorMessage } from '../utils/errors.js';
import { EVASION_CATALOG_VERSION, EVASION_PATCHES, type EvasionPatch } from './patches.js';

const logger = createLogger('EvasionInjector');

type EvasionInjectorOptions = {
  patches?: readonly EvasionPatch[];
  metrics?: EngineMetrics;
};

type InjectionReport = {
  applied: string[];
  failed: string[];
};

type PatchMode = {
  register: boolean;
  only?: (patch: EvasionPatch) => boolean;
};

/**
 * Applies the fingerprint patch catalog to a surface. A patch that throws is
 * logged, counted under `evasion.patch_failed` and skipped; the rest still run.
 */
export class EvasionInjector {
  private readonly patches: readonly EvasionPatch[];
  private readonly metrics: EngineMetrics | undefined;

  constructor(options: EvasionInjectorOptions = {}) {
    this.patches = options.patches ?? EVASION_PATCHES;
    this.metrics = options.metrics;
  }

  get catalogVersion(): number {
    return EVASION_CATALOG_VERSION;
  }

  /** Registers every patch for future documents and runs it on the current one. */
  async applyAtLaunch(surface: BrowserSurface, identity: Identity): Promise<InjectionReport> {
    return this.apply(surface, identity, { register: true });
  }

  async applyBeforeNavigation(surface: BrowserSurface, identity: Identity): Promise<InjectionReport> {
    return this.apply(surface, identity, { register: false });
  }

  /**
   * Identity-bound patches are registered again so the next document reports
   * the new identity. Earlier registrations still run first and get overridden.
   */
  async applyOnRotation(surface: BrowserSurface, identity: Identity): Promise<InjectionReport> {
    return this.apply(surface, identity, { register: true, only: patch => patch.identityBound });
  }

  private async apply(
    surface: BrowserSurface,
    identity: Identity,
    mode: PatchMode,
  ): Promise<InjectionReport> {
    const report: InjectionReport = { applied: [], failed: [] };

    for (const patch of this.patches) {
      if (mode.only && !mode.only(patch)) continue;
      if (patch.applies && !patch.applies(identity)) continue;

      try {
        const source = patch.build(identity);
        if (mode.register) {
          await surface.addInitScript(source);
        }
        await surface.evaluate(source);
        report.applied.push(patch.name);
      } catch (error) {
        report.failed.push(patch.name);
        this.metrics?.increment('evasion.patch_failed');
        logger.warn(`Patch ${patch.name} failed:`, errorMessage(error));
      }
    }

    this.metrics?.increment('evasion.patch_applied', report.applied.length);
    logger.debug('Evasion applied', {
      version: EVASION_CATALOG_VERSION,
      applied: report.applied.length,
      failed: report.failed.length,
    });

    return report;
  }
}

export type { EvasionInjectorOptions, InjectionReport };
