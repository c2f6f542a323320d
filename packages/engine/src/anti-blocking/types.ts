type NavigationFailureClass = 'timeout' | 'network' | 'blocked' | 'closed' | 'system';

/**
 * - `continue`: treat the page as loaded and read whatever is there
 * - `retry`: load the same URL again
 * - `rotate`: switch identity, then load again
 */
type NavigationAction = 'continue' | 'retry' | 'rotate' | 'fail';

type RetryDecision = {
  action: NavigationAction;
  delayMs: number;
  errorClass: NavigationFailureClass;
};

type BlockReason = 'consent' | 'bot-check' | 'recaptcha' | 'unusual-traffic';

export type { BlockReason, NavigationAction, NavigationFailureClass, RetryDecision };
