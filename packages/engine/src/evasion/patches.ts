import { isChromiumFamily, NAVIGATOR_PLATFORM } from '../identity/headers.js';
import type { Identity } from '../identity/types.js';

/** Bumped whenever a patch is added, removed or changes what it reports. */
const EVASION_CATALOG_VERSION = 3;

type EvasionPatch = {
  name: string;
  /** Re-applied after a rotation because its values come from the identity. */
  identityBound: boolean;
  applies?: (identity: Identity) => boolean;
  build: (identity: Identity) => string;
};

const literal = (value: unknown): string => JSON.stringify(value);

/**
 * Wraps a patch body in an IIFE. Every body redefines configurable getters
 * or checks its own marker, so evaluating the same script twice is harmless.
 */
const script = (name: string, body: string): string => {
  const marker = body.includes('marker')
    ? `  const marker = Symbol.for('tubeveil.evasion.${name}');\n`
    : '';
  return `(() => {\n${marker}${body}\n})();`;
};

const defineGetter = (target: string, property: string, value: string): string =>
  `  Object.defineProperty(${target}, ${literal(property)}, { get: () => ${value}, configurable: true });`;

const webdriverFlag: EvasionPatch = {
  name: 'webdriver-flag',
  identityBound: false,
  build: () =>
    script('webdriver-flag', defineGetter('Navigator.prototype', 'webdriver', 'undefined')),
};

const plugins: EvasionPatch = {
  name: 'plugins',
  identityBound: false,
  applies: identity => !identity.mobile,
  build: () =>
    script(
      'plugins',
      `  if (navigator.plugins.length > 0 || window[marker]) return;
  const entries = [
    { name: 'PDF Viewer', filename: 'internal-pdf-viewer', description: 'Portable Document Format' },
    { name: 'Chrome PDF Viewer', filename: 'internal-pdf-viewer', description: 'Portable Document Format' },
    { name: 'Chromium PDF Viewer', filename: 'internal-pdf-viewer', description: 'Portable Document Format' },
  ];
  const list = Object.create(PluginArray.prototype);
  entries.forEach((entry, index) => {
    list[index] = Object.create(Plugin.prototype, {
      name: { value: entry.name, enumerable: true },
      filename: { value: entry.filename, enumerable: true },
      description: { value: entry.description, enumerable: true },
      length: { value: 0, enumerable: true },
    });
  });
  Object.defineProperty(list, 'length', { value: entries.length });
  Object.defineProperty(list, 'item', { value: index => list[index] || null });
  Object.defineProperty(list, 'namedItem', {
    value: name => {
      const index = entries.findIndex(entry => entry.name === name);
      return index >= 0 ? list[index] : null;
    },
  });
  Object.defineProperty(list, 'refresh', { value: () => undefined });
  Object.defineProperty(Navigator.prototype, 'plugins', { get: () => list, configurable: true });
  window[marker] = true;`,
    ),
};

const languages: EvasionPatch = {
  name: 'languages',
  identityBound: true,
  build: identity =>
    script(
      'languages',
      [
        `  const languages = Object.freeze(${literal(identity.languages)});`,
        defineGetter('Navigator.prototype', 'languages', 'languages'),
        defineGetter('Navigator.prototype', 'language', 'languages[0]'),
        defineGetter('Navigator.prototype', 'platform', literal(NAVIGATOR_PLATFORM[identity.platform])),
      ].join('\n'),
    ),
};

const permissions: EvasionPatch = {
  name: 'permissions',
  identityBound: false,
  build: () =>
    script(
      'permissions',
      `  const proto = window.Permissions && window.Permissions.prototype;
  if (!proto || proto[marker]) return;
  const query = proto.query;
  proto.query = function (parameters) {
    if (parameters && parameters.name === 'notifications') {
      return Promise.resolve({ state: Notification.permission, onchange: null });
    }
    return query.call(this, parameters);
  };
  proto[marker] = true;`,
    ),
};

const chromeRuntime: EvasionPatch = {
  name: 'chrome-runtime',
  identityBound: true,
  applies: identity => isChromiumFamily(identity.family),
  build: () =>
    script(
      'chrome-runtime',
      `  if (!window.chrome) {
    Object.defineProperty(window, 'chrome', { value: {}, writable: true, enumerable: true, configurable: true });
  }
  if (!window.chrome.runtime) {
    window.chrome.runtime = {
      OnInstalledReason: { INSTALL: 'install', UPDATE: 'update', CHROME_UPDATE: 'chrome_update' },
      PlatformOs: { MAC: 'mac', WIN: 'win', ANDROID: 'android', CROS: 'cros', LINUX: 'linux' },
      connect: () => ({ onDisconnect: { addListener: () => undefined } }),
      sendMessage: () => undefined,
    };
  }`,
    ),
};

const hardware: EvasionPatch = {
  name: 'hardware',
  identityBound: true,
  build: identity =>
    script(
      'hardware',
      [
        defineGetter('Navigator.prototype', 'deviceMemory', literal(identity.deviceMemory)),
        defineGetter('Navigator.prototype', 'hardwareConcurrency', literal(identity.hardwareConcurrency)),
      ].join('\n'),
    ),
};

const screen: EvasionPatch = {
  name: 'screen',
  identityBound: true,
  build: identity => {
    const { width, height } = identity.viewport;
    return script(
      'screen',
      [
        defineGetter('Screen.prototype', 'width', literal(width)),
        defineGetter('Screen.prototype', 'height', literal(height)),
        defineGetter('Screen.prototype', 'availWidth', literal(width)),
        defineGetter('Screen.prototype', 'availHeight', literal(Math.max(0, height - 40))),
        defineGetter('Screen.prototype', 'colorDepth', literal(identity.colorDepth)),
        defineGetter('Screen.prototype', 'pixelDepth', literal(identity.colorDepth)),
      ].join('\n'),
    );
  },
};

const timezone: EvasionPatch = {
  name: 'timezone',
  identityBound: true,
  build: identity =>
    script(
      'timezone',
      `  const timeZone = ${literal(identity.timezone)};
  const proto = Intl.DateTimeFormat.prototype;
  const original = proto[marker] || proto.resolvedOptions;
  proto[marker] = original;
  proto.resolvedOptions = function () {
    return { ...original.call(this), timeZone };
  };`,
    ),
};

const battery: EvasionPatch = {
  name: 'battery',
  identityBound: false,
  build: () =>
    script(
      'battery',
      `  if (typeof navigator.getBattery === 'function') return;
  const status = { charging: true, chargingTime: 0, dischargingTime: Infinity, level: 1, addEventListener: () => undefined };
  Object.defineProperty(Navigator.prototype, 'getBattery', { value: () => Promise.resolve(status), configurable: true });`,
    ),
};

const connection: EvasionPatch = {
  name: 'connection',
  identityBound: false,
  build: () =>
    script(
      'connection',
      `  const info = { effectiveType: '4g', downlink: 10, rtt: 50, saveData: false, addEventListener: () => undefined };
  Object.defineProperty(Navigator.prototype, 'connection', { get: () => info, configurable: true });`,
    ),
};

const canvasNoise: EvasionPatch = {
  name: 'canvas-noise',
  identityBound: false,
  build: () =>
    script(
      'canvas-noise',
      `  const proto = CanvasRenderingContext2D.prototype;
  if (proto[marker]) return;
  const getImageData = proto.getImageData;
  proto.getImageData = function (...args) {
    const image = getImageData.apply(this, args);
    for (let i = 0; i < image.data.length; i += 4) {
      image.data[i] += Math.floor(Math.random() * 10) - 5;
      image.data[i + 1] += Math.floor(Math.random() * 10) - 5;
      image.data[i + 2] += Math.floor(Math.random() * 10) - 5;
    }
    return image;
  };
  proto[marker] = true;`,
    ),
};

const webrtcPassthrough: EvasionPatch = {
  name: 'webrtc-passthrough',
  identityBound: false,
  build: () =>
    script(
      'webrtc-passthrough',
      `  const Peer = window.RTCPeerConnection || window.webkitRTCPeerConnection;
  if (!Peer || Peer.prototype[marker]) return;
  const createDataChannel = Peer.prototype.createDataChannel;
  Peer.prototype.createDataChannel = function (...args) {
    return createDataChannel.apply(this, args);
  };
  Peer.prototype[marker] = true;`,
    ),
};

const EVASION_PATCHES: readonly EvasionPatch[] = [
  webdriverFlag,
  plugins,
  languages,
  permissions,
  chromeRuntime,
  hardware,
  screen,
  timezone,
  battery,
  connection,
  canvasNoise,
  webrtcPassthrough,
];

export { EVASION_CATALOG_VERSION, EVASION_PATCHES };
export type { EvasionPatch };
