/**
 * Card configuration types shared by the interpreter, stores and renderer.
 */

/**
 * Mutable per-session card configuration.
 * Numeric fields always sit inside the ranges described by CardLimits.
 */
export interface RenderConfig {
  text: string;
  fontSize: number;
  lineSpacing: number;
  curveEnabled: boolean;
  offsetX: number;
  offsetY: number;
  role: string;
}

/**
 * Identifies one independent configuration stream.
 * channel = originating surface, identity = best available requester id.
 */
export interface SessionKey {
  channel: string;
  identity: string;
}

/**
 * What the chat surface can tell us about the requester.
 * Resolved to a SessionKey identity in this order: sessionId, senderId, senderName.
 */
export interface RequesterIdentity {
  sessionId?: string | null;
  senderId?: string | null;
  senderName?: string | null;
}

export interface CardLimits {
  fontSizeMin: number;
  fontSizeMax: number;
  fontSizeStep: number;
  lineSpacingMin: number;
  lineSpacingMax: number;
  lineSpacingStep: number;
  offsetMin: number;
  offsetMax: number;
  offsetStep: number;
  maxTextLength: number;
}

export interface CardDefaults {
  text: string;
  fontSize: number;
  lineSpacing: number;
  role: string;
}

// Passed through to the renderer untouched
export interface CardRenderOptions {
  curveIntensity: number;
  shadowEnabled: boolean;
  emojiSet: string;
}

export interface CardSettings {
  limits: CardLimits;
  defaults: CardDefaults;
  render: CardRenderOptions;
  adaptiveTextSizing: boolean;
  showSuccessMessages: boolean;
  randomPersonaFlag: string;
}

/**
 * Snapshot layout inside the durable state document.
 */
export interface StoredRenderConfig {
  text: string;
  font_size: number;
  line_spacing: number;
  curve_enabled: boolean;
  offset_x: number;
  offset_y: number;
  role: string;
}

export interface StoredStateEntry {
  config: StoredRenderConfig;
  timestamp: number; // unix seconds
}

export interface StateDocument {
  states: Record<string, StoredStateEntry>;
  last_updated: number;
}
