import { errorMessage, TranslationError } from '../lib/errors'
import { getLogger } from '../lib/logger'
import { getOpenAIClient, OPENAI_MODEL } from '../lib/openai'
import { getLanguageName } from '../utils/languages'
import type { TranslatedSegment, Translator, TranscriptSegment } from './pipeline'

/** Lines per chat request; keeps replies well under the token limit. */
export const BATCH_SIZE = 20

/** Whisper emits "-" and single characters for silence or music; those are not worth translating. */
export function isSpeechSegment(segment: TranscriptSegment): boolean {
  const text = segment.text.trim()
  return text.length > 1 && text !== '-'
}

export function buildBatchPrompt(texts: readonly string[], targetLanguageName: string): string {
  const numberedText = texts.map((t, idx) => `${idx + 1}. ${t.replace(/\n/g, ' ')}`).join('\n')
  return `Translate the following ${texts.length} transcript lines to ${targetLanguageName}.

CRITICAL REQUIREMENTS:
- You MUST translate ALL ${texts.length} lines
- Return EXACTLY ${texts.length} lines, no more, no less
- Format: "1. translated text" (one per line)
- Do NOT add explanations, comments, or extra text
- Keep the spoken, natural register of the original

Text to translate:
${numberedText}

Return ALL ${texts.length} translations in numbered format (1. through ${texts.length}.):`
}

/**
 * Parse a numbered reply into lines. Accepts "1. text", "1) text" and "1 - text";
 * unnumbered lines are taken as-is. Code fences and a leading "Translation:" are stripped.
 */
export function parseNumberedLines(reply: string): string[] {
  const cleaned = reply
    .replace(/```[\s\S]*?```/g, '')
    .replace(/^Translation:?\s*/i, '')
    .trim()
  const lines: string[] = []
  for (const line of cleaned.split('\n')) {
    const trimmed = line.trim()
    if (!trimmed) continue
    const numbered = trimmed.match(/^\d+\s*[.)-]\s*(.+)$/)
    const extracted = numbered ? numbered[1].trim() : trimmed
    if (extracted) lines.push(extracted)
  }
  return lines
}

/** Pair each source segment with its translation; a missing line keeps the original text. */
export function mergeTranslations(batch: readonly TranscriptSegment[], lines: readonly string[]): TranslatedSegment[] {
  return batch.map((segment, idx) => ({
    start: segment.start,
    end: segment.end,
    text: lines[idx] || segment.text,
    originalText: segment.text,
  }))
}

export class OpenAITranslator implements Translator {
  constructor(private readonly model: string = OPENAI_MODEL) {}

  async translate(segments: TranscriptSegment[], targetLanguage: string): Promise<TranslatedSegment[]> {
    const log = getLogger('worker')
    const languageName = getLanguageName(targetLanguage)
    const speech = segments.filter(isSpeechSegment)
    const translated: TranslatedSegment[] = []
    try {
      for (let i = 0; i < speech.length; i += BATCH_SIZE) {
        const batch = speech.slice(i, i + BATCH_SIZE)
        const response = await getOpenAIClient().chat.completions.create({
          model: this.model,
          messages: [{ role: 'user', content: buildBatchPrompt(batch.map((s) => s.text), languageName) }],
          temperature: 0.3,
          max_tokens: 2000,
        })
        const lines = parseNumberedLines(response.choices[0]?.message?.content ?? '')
        if (lines.length < batch.length) {
          log.warn({ msg: 'Translation returned fewer lines than requested', expected: batch.length, got: lines.length })
        }
        translated.push(...mergeTranslations(batch, lines))
      }
    } catch (err) {
      throw new TranslationError(errorMessage(err), { cause: err })
    }
    log.info({ msg: 'Translated transcript', targetLanguage, segments: translated.length, dropped: segments.length - speech.length })
    return translated
  }
}
