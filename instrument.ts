import * as Sentry from "@sentry/node"

// Import this file before anything else in long-running entry points.
Sentry.init({
  dsn: process.env.SENTRY_DSN,

  // Enable structured logging
  enableLogs: true,

  integrations: [
    Sentry.consoleLoggingIntegration({
      levels: ["warn", "error"],
    }),
  ],

  tracesSampleRate: process.env.NODE_ENV === "production" ? 0.1 : 1.0,

  debug: false,
})
