// ============================================================================
// FINGERPRINT - Spoofed context options and automation-surface overrides
// ============================================================================

import type { BrowserConfig } from '../config/AppConfig.js';
import {
  DEFAULT_USER_AGENT,
  DESKTOP_USER_AGENTS,
  STEALTH_HTTP_HEADERS,
} from '../config/chrome-flags.js';
import { pick, type Random } from '../utils/timing.js';

export interface Fingerprint {
  userAgent: string;
  viewport: { width: number; height: number };
  locale: string;
  timezoneId: string;
  deviceScaleFactor: number;
  isMobile: boolean;
  hasTouch: boolean;
  extraHTTPHeaders: Record<string, string>;
}

/**
 * Context options for one session. Viewport, locale and timezone are fixed;
 * only the user agent varies between runs.
 */
export function buildFingerprint(config: BrowserConfig, rng: Random): Fingerprint {
  return {
    userAgent: config.userAgentRotation ? pick(rng, DESKTOP_USER_AGENTS) : DEFAULT_USER_AGENT,
    viewport: { ...config.viewport },
    locale: config.locale,
    timezoneId: config.timezoneId,
    deviceScaleFactor: config.deviceScaleFactor,
    isMobile: config.isMobile,
    hasTouch: config.hasTouch,
    extraHTTPHeaders: { ...STEALTH_HTTP_HEADERS },
  };
}

/**
 * Init script registered on the context before the first navigation, so
 * page scripts never see the unpatched values.
 */
export function getStealthInitScript(languages: readonly string[] = ['en-US', 'en']): string {
  return `
    (function() {
      Object.defineProperty(navigator, 'webdriver', {
        get: function() { return undefined; }
      });

      Object.defineProperty(navigator, 'plugins', {
        get: function() { return [1, 2, 3, 4, 5]; }
      });

      Object.defineProperty(navigator, 'languages', {
        get: function() { return ${JSON.stringify(languages)}; }
      });

      window.chrome = window.chrome || {};
      window.chrome.runtime = window.chrome.runtime || {};

      if (window.navigator.permissions && window.navigator.permissions.query) {
        var originalQuery = window.navigator.permissions.query.bind(window.navigator.permissions);
        window.navigator.permissions.query = function(parameters) {
          return parameters && parameters.name === 'notifications'
            ? Promise.resolve({ state: Notification.permission })
            : originalQuery(parameters);
        };
      }
    })();
  `;
}
