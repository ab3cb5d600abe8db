/** ISO 639-1 code -> display name for every language the service knows about. */
export const LANGUAGE_NAMES: Record<string, string> = {
  en: 'English',
  es: 'Spanish',
  fr: 'French',
  de: 'German',
  it: 'Italian',
  pt: 'Portuguese',
  ru: 'Russian',
  ja: 'Japanese',
  ko: 'Korean',
  zh: 'Chinese',
  hi: 'Hindi',
  ar: 'Arabic',
}

const DEFAULT_SUPPORTED = Object.keys(LANGUAGE_NAMES)

/** Parse a comma-separated SUPPORTED_LANGUAGES value; unknown codes are kept (named by their code). */
export function parseSupportedLanguages(raw: string | undefined): string[] {
  if (!raw || !raw.trim()) return DEFAULT_SUPPORTED
  const codes = raw
    .split(',')
    .map((c) => c.trim().toLowerCase())
    .filter(Boolean)
  return codes.length > 0 ? Array.from(new Set(codes)) : DEFAULT_SUPPORTED
}

export const SUPPORTED_LANGUAGES = parseSupportedLanguages(process.env.SUPPORTED_LANGUAGES)

export function getLanguageName(code: string): string {
  return LANGUAGE_NAMES[code] || code
}

/** Supported code -> name map for the languages endpoint. */
export function getSupportedLanguageMap(supported: readonly string[] = SUPPORTED_LANGUAGES): Record<string, string> {
  const out: Record<string, string> = {}
  for (const code of supported) out[code] = getLanguageName(code)
  return out
}

/**
 * Whisper reports the detected language as a lowercase English name ("english", "spanish").
 * Map it back to the ISO code; codes pass through unchanged. Names the table does not know map to undefined.
 */
export function toLanguageCode(nameOrCode: string | undefined): string | undefined {
  if (!nameOrCode) return undefined
  const value = nameOrCode.trim().toLowerCase()
  if (!value) return undefined
  if (LANGUAGE_NAMES[value]) return value
  for (const [code, name] of Object.entries(LANGUAGE_NAMES)) {
    if (name.toLowerCase() === value) return code
  }
  // Whisper says "chinese" but some providers say "mandarin"
  if (value === 'mandarin') return 'zh'
  return /^[a-z]{2,3}$/.test(value) ? value : undefined
}
