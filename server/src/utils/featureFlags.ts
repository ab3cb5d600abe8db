/**
 * Env-driven switches. All default to FALSE. Set env to "true" | "1" | "yes" (case-insensitive) to enable.
 */
export function isFlagEnabled(value: string | undefined): boolean {
  if (value == null || typeof value !== 'string') return false
  return /^(1|true|yes)$/i.test(value.trim())
}

/** Skip voice synthesis and composition; jobs complete with the original video and a demo note. */
export const VOICE_DEMO_MODE = isFlagEnabled(process.env.VOICE_DEMO_MODE)
