/**
 * Telemetry configuration for OpenTelemetry trace export.
 *
 * Export is enabled only when SITE_BRIEFING_OTLP_TOKEN is set.
 */

/** Internal flag to avoid repeated warnings (mutable) */
let _warnedDisabled = false;

export const TELEMETRY_CONFIG = {
  /** Service name reported to the collector */
  serviceName: "site-briefing-server",

  /** Environment variable for the collector auth token */
  tokenEnvVar: "SITE_BRIEFING_OTLP_TOKEN",

  /** OTLP endpoint (without the /v1/traces suffix) */
  getEndpoint: (): string => process.env.SITE_BRIEFING_OTLP_ENDPOINT || "http://localhost:4318",

  /** Check if telemetry should be enabled (logs warning once if disabled) */
  enabled: (): boolean => {
    const hasToken = !!process.env.SITE_BRIEFING_OTLP_TOKEN;
    if (!hasToken && !_warnedDisabled) {
      console.warn("[TELEMETRY] SITE_BRIEFING_OTLP_TOKEN not set - telemetry disabled");
      _warnedDisabled = true;
    }
    return hasToken;
  },

  /** Get the auth token from environment */
  getToken: (): string | undefined => process.env.SITE_BRIEFING_OTLP_TOKEN,

  /** Get deployment environment name */
  getEnvironment: (): string => process.env.NODE_ENV || "local",
} as const;
