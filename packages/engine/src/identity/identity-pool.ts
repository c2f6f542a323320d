import type { ContextIdentity } from '@tubeveil/browser-driver';
import { mathRandom, pick, type RandomSource } from '../utils/random.js';
import { loadIdentityCatalog } from './catalog.js';
import { buildHeaders, contextHeaders, NAVIGATOR_PLATFORM } from './headers.js';
import type { Identity, IdentityCatalog } from './types.js';

/**
 * Draws plausible identities from the catalog. Draws are independent:
 * consecutive picks may repeat.
 */
export class IdentityPool {
  private readonly catalog: IdentityCatalog;
  private readonly rng: RandomSource;

  constructor(catalog: IdentityCatalog = loadIdentityCatalog(), rng: RandomSource = mathRandom) {
    this.catalog = catalog;
    this.rng = rng;
  }

  pick(): Identity {
    const agent = pick(this.rng, this.catalog.userAgents);
    const locale = pick(this.rng, this.catalog.locales);
    const viewports = agent.mobile ? this.catalog.viewports.mobile : this.catalog.viewports.desktop;
    const viewport = pick(this.rng, viewports);
    const doNotTrack = this.rng.next() < 0.5;

    return Object.freeze({
      userAgent: agent.userAgent,
      family: agent.family,
      platform: agent.platform,
      mobile: agent.mobile,
      headers: Object.freeze(buildHeaders(agent, locale.acceptLanguage, doNotTrack)),
      viewport: Object.freeze({ ...viewport }),
      locale: locale.locale,
      languages: Object.freeze([...locale.languages]),
      timezone: pick(this.rng, this.catalog.timezones),
      colorDepth: pick(this.rng, this.catalog.hardware.colorDepth),
      deviceMemory: pick(this.rng, this.catalog.hardware.deviceMemory),
      hardwareConcurrency: pick(this.rng, this.catalog.hardware.hardwareConcurrency),
    });
  }

  get size(): number {
    return this.catalog.userAgents.length;
  }
}

/** The subset of an identity the live browser context can take. */
export function toContextIdentity(identity: Identity): ContextIdentity {
  return {
    userAgent: identity.userAgent,
    platform: NAVIGATOR_PLATFORM[identity.platform],
    acceptLanguage: identity.headers['Accept-Language'] ?? identity.languages.join(','),
    locale: identity.locale,
    timezoneId: identity.timezone,
    viewport: { ...identity.viewport },
    extraHTTPHeaders: contextHeaders(identity.headers),
  };
}
