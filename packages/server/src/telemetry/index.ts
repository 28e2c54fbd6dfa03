/**
 * OpenTelemetry tracing for the briefing server.
 *
 * Traces go to an OTLP/HTTP (protobuf) collector when SITE_BRIEFING_OTLP_TOKEN
 * is set. Call `initTelemetry` before the HTTP server is created so the http
 * instrumentation can patch the module.
 */

import { NodeSDK } from "@opentelemetry/sdk-node";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-proto";
import { resourceFromAttributes } from "@opentelemetry/resources";
import { HttpInstrumentation } from "@opentelemetry/instrumentation-http";
import { TELEMETRY_CONFIG } from "../config/telemetry.js";
import { API_PREFIX } from "../config/paths.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("TELEMETRY");

const HEALTH_PATH = `${API_PREFIX}/health`;

let sdk: NodeSDK | null = null;
let started = false;

function buildSdk(token: string): NodeSDK {
  return new NodeSDK({
    resource: resourceFromAttributes({
      "service.name": TELEMETRY_CONFIG.serviceName,
      "service.version": process.env.npm_package_version || "0.0.0",
      "deployment.environment": TELEMETRY_CONFIG.getEnvironment(),
    }),
    traceExporter: new OTLPTraceExporter({
      url: `${TELEMETRY_CONFIG.getEndpoint()}/v1/traces`,
      headers: { Authorization: token },
    }),
    instrumentations: [
      // Health checks would drown out briefing traffic
      new HttpInstrumentation({ ignoreIncomingRequestHook: (req) => req.url === HEALTH_PATH }),
    ],
  });
}

/**
 * Start tracing. Later calls do nothing.
 */
export function initTelemetry(): void {
  if (started) return;
  started = true;

  if (!TELEMETRY_CONFIG.enabled()) return;

  const token = TELEMETRY_CONFIG.getToken();
  if (!token) return;

  sdk = buildSdk(token);
  sdk.start();
  logger.info(`Tracing ${TELEMETRY_CONFIG.serviceName} to ${TELEMETRY_CONFIG.getEndpoint()}`);
}

/**
 * Flush pending spans and stop the SDK.
 */
export async function shutdownTelemetry(): Promise<void> {
  const running = sdk;
  if (!running) return;
  sdk = null;

  try {
    await running.shutdown();
  } catch (error) {
    logger.error("Failed to flush traces on shutdown", error);
  }
}

export { withSpanSync, recordError, contextAttributes, type SpanAttributes } from "./spans.js";
