import { CLIENT_VERSION } from './constants'
import { maskSecrets } from './logger'

type SentryModule = typeof import('@sentry/node')

let sentry: SentryModule | null = null

const SENSITIVE_HEADERS = ['x-registry-config', 'x-registry-auth', 'authorization']

/**
 * Initialize Sentry only when SENTRY_DSN is set (opt-in).
 */
export async function initSentry(): Promise<void> {
  const dsn = process.env.SENTRY_DSN
  if (!dsn) {
    return
  }

  const Sentry = await import('@sentry/node')
  Sentry.init({
    dsn,
    release: `container-build-client@${CLIENT_VERSION}`,
    environment: process.env.SENTRY_ENVIRONMENT || process.env.NODE_ENV || 'production',
    tracesSampleRate: 0,
    sendDefaultPii: false,
    beforeSend(event) {
      if (event.request?.headers) {
        for (const name of Object.keys(event.request.headers)) {
          if (SENSITIVE_HEADERS.includes(name.toLowerCase())) {
            event.request.headers[name] = '[Filtered]'
          }
        }
      }
      if (event.breadcrumbs) {
        event.breadcrumbs = event.breadcrumbs.map((breadcrumb) => ({
          ...breadcrumb,
          message: breadcrumb.message ? maskSecrets(breadcrumb.message) : breadcrumb.message,
        }))
      }
      return event
    },
  })
  sentry = Sentry
}

/**
 * Report an exception. No-op until initialized.
 */
export function captureException(error: unknown, context?: Record<string, unknown>): void {
  if (!sentry) return
  sentry.captureException(error, context ? { extra: context } : undefined)
}

/**
 * Flush queued events; call before the process exits.
 */
export async function flushSentry(): Promise<void> {
  if (!sentry) return
  await sentry.flush(2000)
}
