import { Hono } from 'hono'
import info from '../package.json' with { type: 'json' }
import { createAppleRoutes, type OnAuthenticated } from './auth/apple-routes.ts'
import {
  createMemorySessionStore,
  type SessionStore,
} from './auth/session-store.ts'
import { log } from './plumbing/logger.ts'
import {
  type AppleAuthAdapter,
  createAppleAuthAdapter,
} from './providers/apple.ts'
import { createAdapterConfig, getAppleConfig } from './providers/apple-config.ts'

const { name, version } = info

export interface AppOptions {
  /** null disables Apple sign-in; undefined builds it from the environment */
  adapter?: AppleAuthAdapter | null
  sessionStore?: SessionStore
  onAuthenticated?: OnAuthenticated
}

/**
 * Adapter from APPLE_* environment variables, or null when they are not
 * all set. Present-but-invalid settings throw a ConfigurationError.
 */
export const createAdapterFromEnv = (): AppleAuthAdapter | null => {
  const { input, isConfigured } = getAppleConfig()
  if (!isConfigured) {
    log('Apple sign-in is not configured - /auth/apple will answer 503')
    return null
  }
  return createAppleAuthAdapter({ config: createAdapterConfig(input) })
}

export const createApp = (options: AppOptions = {}): Hono => {
  const adapter =
    options.adapter === undefined ? createAdapterFromEnv() : options.adapter

  const app = new Hono()

  app.get('/', (c) =>
    c.json({
      message: 'No base get function defined',
    }),
  )

  app.get('/about', (c) =>
    c.json({
      name,
      version,
    }),
  )

  app.route(
    '/',
    createAppleRoutes({
      adapter,
      sessionStore: options.sessionStore ?? createMemorySessionStore(),
      onAuthenticated: options.onAuthenticated,
    }),
  )

  return app
}
