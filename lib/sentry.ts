import * as Sentry from "@sentry/node"

/**
 * Initialises Sentry for structured logs and error capture.
 *
 * Does nothing without a DSN, leaving `logger` calls as no-ops.
 */
export function initSentry(dsn: string | undefined = process.env.SENTRY_DSN): boolean {
  if (!dsn) return false

  Sentry.init({
    dsn,

    // Enable structured logging
    enableLogs: true,

    integrations: [
      // Console integration - captures console.log, console.warn, console.error
      Sentry.consoleLoggingIntegration({
        levels: ["log", "warn", "error"],
      }),
      // Vercel AI SDK integration - tracks LLM calls, tokens, latency
      Sentry.vercelAIIntegration({
        recordInputs: false,
        recordOutputs: false,
      }),
    ],

    // Production: 10%, Development: 100%
    tracesSampleRate: process.env.NODE_ENV === "production" ? 0.1 : 1.0,

    debug: false,
  })

  return true
}
