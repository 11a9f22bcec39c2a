/**
 * Central Timeout Configuration
 *
 * All timeout and pacing values should be imported from this module so the
 * fallback ladders, the login loop and the recorder agree on timing.
 *
 * Timeout categories:
 * - ACTION: a single native fill/click attempt
 * - NAVIGATION: full page loads
 * - NETWORK_IDLE: bounded waits after submits
 * - *_SETTLE: fixed pauses letting animations and transitions finish
 * - *_KEY_DELAY: per-character pacing for simulated typing
 */

/**
 * Default timeout values in milliseconds
 */
export const TIMEOUTS = {
  /**
   * Native fill/click attempt, and visibility wait before a fill
   */
  ACTION: 3000,

  /**
   * Reading a field back after filling it
   */
  READ_BACK: 1000,

  /**
   * Full page load (login page, target page)
   */
  NAVIGATION: 60000,

  /**
   * Wait for network idle after clicking a submit control
   */
  NETWORK_IDLE: 5000,

  /**
   * Pause before each analysis cycle
   */
  CYCLE_SETTLE: 2000,

  /**
   * Pause after accepting a cookie banner
   */
  CONSENT_SETTLE: 1000,

  /**
   * Pause when a cycle produced no interaction at all
   */
  IDLE_RETRY: 5000,

  /**
   * Pause before the brute-force submit search
   */
  LABEL_SEARCH_SETTLE: 2000,

  /**
   * Per-key delay for simulated typing in form fields
   */
  TYPE_KEY_DELAY: 50,

  /**
   * Per-key delay for simulated OTP typing
   */
  OTP_KEY_DELAY: 100,

  /**
   * Pause after focusing an OTP input
   */
  OTP_FOCUS_SETTLE: 500,

  /**
   * Pause after pasting or typing an OTP before probing
   */
  OTP_PROBE_SETTLE: 1000,

  /**
   * Click on an explored element during capture
   */
  EXPLORE_CLICK: 2000,

  /**
   * Wait after an exploration click so triggered requests complete
   */
  EXPLORE_SETTLE: 3000,
} as const;

/**
 * Type for timeout keys
 */
export type TimeoutKey = keyof typeof TIMEOUTS;

/**
 * Get a timeout value with optional override
 *
 * @param override - takes precedence when provided
 */
export function getTimeout(key: TimeoutKey, override?: number): number {
  return override ?? TIMEOUTS[key];
}
