/**
 * Error output sanitization utilities
 *
 * Removes user-specific paths from error messages before they reach the
 * terminal.
 */

import { homedir } from 'os'

/**
 * Sanitize error messages to remove user-specific paths
 *
 * Replaces home directory paths with ~ for macOS/Linux/Windows systems:
 * - Unix/Linux: /home/username/
 * - macOS: /Users/username/
 * - Windows: C:\Users\username\
 */
export function sanitizeError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error)
  const home = homedir()

  // Escape special regex characters in the home path
  const escapedHome = home.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')

  let sanitized = message.replace(new RegExp(escapedHome, 'g'), '~')

  sanitized = sanitized.replace(/\/Users\/[^/]+\//g, '~/')
  sanitized = sanitized.replace(/\/home\/[^/]+\//g, '~/')
  sanitized = sanitized.replace(/C:\\Users\\[^\\]+\\/gi, '~\\')

  return sanitized
}
