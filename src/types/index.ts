/**
 * Shared types for login automation, network capture and session persistence
 */

// ============================================
// PAGE ANALYSIS
// ============================================

/**
 * Best-guess map of the login affordances on the current page.
 * An absent selector means the affordance is not on this page.
 */
export interface PageAffordanceMap {
  emailSelector?: string;
  passwordSelector?: string;
  otpSelector?: string;
  primaryActionSelector?: string;
  cookieConsentSelector?: string;
  /** When true the login loop terminates regardless of the other fields */
  isLoggedIn: boolean;
  /** Free-form description of the step, for logs */
  description: string;
}

// ============================================
// INPUT ACTUATION
// ============================================

export type ActuatorTechnique = 'native' | 'simulated' | 'dom-injection';

export type OtpTechnique = 'global-paste' | 'focus-paste' | 'focus-type' | 'operator';

/**
 * Result of one fallback technique
 */
export interface ActionOutcome<T extends string = ActuatorTechnique> {
  technique: T;
  succeeded: boolean;
}

// ============================================
// NETWORK CAPTURE
// ============================================

/**
 * Opaque per-event context attached by enrichment
 */
export interface EventContext {
  purpose: string;
  category: 'read' | 'write' | 'auth' | 'analytics' | 'other';
  useful_for_tool: boolean;
}

/**
 * One captured programmatic request. Field names follow the on-disk log format.
 */
export interface NetworkEvent {
  method: string;
  url: string;
  request_headers: Record<string, string>;
  status: number;
  post_data?: string;
  post_data_base64?: string;
  is_binary: boolean;
  ai_context?: EventContext;
}

// ============================================
// SESSION STATE
// ============================================

export type SameSite = 'Strict' | 'Lax' | 'None';

export interface StoredCookie {
  name: string;
  value: string;
  domain: string;
  path?: string;
  expires?: number;
  httpOnly?: boolean;
  secure?: boolean;
  sameSite: SameSite;
}

export interface StoredOrigin {
  origin: string;
  localStorage: Array<{ name: string; value: string }>;
}

/**
 * Authenticated storage state as persisted to disk
 */
export interface SessionState {
  cookies: StoredCookie[];
  origins?: StoredOrigin[];
}
