/**
 * Local auth provider
 *
 * Single-user identity for hosts without a sign-in service: the user id
 * comes from SERMON_CAPTURE_USER_ID, then the `auth.userId` setting.
 */

import { getDatabaseService } from './database'
import { settingsService } from './settingsService'
import type { AuthProvider } from '../types/collaborators'

export const USER_ID_ENV = 'SERMON_CAPTURE_USER_ID'
export const USER_ID_SETTING = 'auth.userId'

export function createLocalAuthProvider(): AuthProvider {
  return {
    currentUserId(): string | null {
      const fromEnv = process.env[USER_ID_ENV]?.trim()
      if (fromEnv) return fromEnv

      if (!getDatabaseService().isInitialized()) return null
      const stored = settingsService.getString(USER_ID_SETTING, '').trim()
      return stored.length > 0 ? stored : null
    },

    async refreshSession(): Promise<void> {}
  }
}

/**
 * Fixed identity, mostly for scripts and tests
 */
export function createStaticAuthProvider(userId: string | null): AuthProvider {
  return {
    currentUserId: () => userId,
    async refreshSession(): Promise<void> {}
  }
}
