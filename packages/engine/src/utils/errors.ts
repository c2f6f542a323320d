type EngineErrorCode =
  | 'invalid-resource'
  | 'browser-unavailable'
  | 'navigation-failed'
  | 'invalid-state'
  | 'unexpected';

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EngineError';
    this.code = code;
  }
}

export class InvalidResourceError extends EngineError {
  readonly url: string;

  constructor(url: string) {
    super('invalid-resource', 'Invalid YouTube URL');
    this.name = 'InvalidResourceError';
    this.url = url;
  }
}

/** The browser handle could not be created. Nothing else can run without it. */
export class BrowserLaunchError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('browser-unavailable', message, options);
    this.name = 'BrowserLaunchError';
  }
}

export class NavigationError extends EngineError {
  readonly failureClass: string;

  constructor(message: string, failureClass: string, options?: { cause?: unknown }) {
    super('navigation-failed', message, options);
    this.name = 'NavigationError';
    this.failureClass = failureClass;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export type { EngineErrorCode };
