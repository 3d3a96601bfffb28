export interface EngineConfig {
  readonly maxInteractions: number;
  readonly expiryWindowMs: number;
  readonly historyWindow: number;
  readonly ctaCooldownMs: number;
  readonly ctaWindowMs: number;
  readonly ctaMaxPerWindow: number;
  readonly renderTurnaroundBusinessDays: number;
  readonly businessTimezone: string;
  readonly maxPersistAttempts: number;
}

const MINUTE = 60 * 1000;
const DAY = 24 * 60 * MINUTE;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = Object.freeze({
  maxInteractions: 15,
  expiryWindowMs: 90 * DAY,
  historyWindow: 10,
  ctaCooldownMs: 5 * MINUTE,
  ctaWindowMs: 60 * MINUTE,
  ctaMaxPerWindow: 2,
  renderTurnaroundBusinessDays: 3,
  businessTimezone: 'America/Chicago',
  maxPersistAttempts: 3,
});

export interface EngineSettings {
  MAX_INTERACTIONS: number;
  MEMORY_EXPIRY_DAYS: number;
  HISTORY_WINDOW: number;
  BUSINESS_TIMEZONE: string;
}

export function buildEngineConfig(settings: EngineSettings): EngineConfig {
  return Object.freeze({
    ...DEFAULT_ENGINE_CONFIG,
    maxInteractions: settings.MAX_INTERACTIONS,
    expiryWindowMs: settings.MEMORY_EXPIRY_DAYS * DAY,
    historyWindow: settings.HISTORY_WINDOW,
    businessTimezone: settings.BUSINESS_TIMEZONE,
  });
}
