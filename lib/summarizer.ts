// lib/summarizer.ts - Short AI summaries with an image suggestion
import { generateObject } from 'ai'
import { createOpenAI } from '@ai-sdk/openai'
import { z } from 'zod'
import type { CategoryDef } from '@/config/regions'
import type { Pacer } from '@/lib/pacer'
import { isHttpUrl, placeholderImageUrl } from '@/lib/text'

export const SummarySchema = z.object({
  summary: z
    .string()
    .describe('A neutral 50-70 word summary of the article, plain text'),
  suggestedImageUrl: z
    .string()
    .describe(
      'An absolute https URL of an image illustrating the story, or an empty string'
    ),
})

export type SummaryRequest = {
  prompt: string
  abortSignal: AbortSignal
}

/** Resolves to the structured payload; validated again by the caller */
export type SummaryGenerator = (request: SummaryRequest) => Promise<unknown>

export type SummarizeInput = {
  title: string
  content: string
  link: string
  category: CategoryDef
  imageHint: string | null
}

export type SummaryResult = {
  summary: string
  imageUrl: string
  failed: boolean
}

export function createOpenAISummaryGenerator(
  apiKey: string,
  model: string
): SummaryGenerator {
  const openai = createOpenAI({ apiKey })
  return async ({ prompt, abortSignal }) => {
    const { object } = await generateObject({
      model: openai(model),
      schema: SummarySchema,
      prompt,
      temperature: 0.3,
      maxOutputTokens: 300,
      // Next scheduled run is the retry
      maxRetries: 0,
      abortSignal,
    })
    return object
  }
}

export function buildSummaryPrompt(input: SummarizeInput): string {
  const lines = [
    `Summarize this ${input.category.label.toLowerCase()} article for a news digest.`,
    '',
    'RULES:',
    '- 50 to 70 words, plain text, no markdown, no headline',
    '- Only state facts present in the source material; do not invent numbers or quotes',
    '- Neutral tone, present tense',
    '- suggestedImageUrl: an absolute https image URL relevant to the story, or "" if unsure',
    '',
    'SOURCE MATERIAL:',
    `Title: ${input.title}`,
    `Content: ${input.content.slice(0, 4000)}`,
  ]
  return lines.join('\n')
}

const QUOTE_PAIRS: Record<string, string> = {
  '"': '"',
  "'": "'",
  '\u201c': '\u201d',
  '\u2018': '\u2019',
}

export function sanitizeSummary(s: string) {
  const t = (s || '').replace(/\s+/g, ' ').trim()
  // Only a matching pair of wrapping quotes is stripped; a lone apostrophe stays
  const close = QUOTE_PAIRS[t.charAt(0)]
  if (close && t.length > 1 && t.endsWith(close)) return t.slice(1, -1).trim()
  return t
}

/** Source image, then the suggested one, then a generated placeholder */
export function resolveImageUrl(
  imageHint: string | null,
  suggested: string | null,
  category: CategoryDef,
  identity: string
): string {
  if (isHttpUrl(imageHint)) return imageHint
  if (isHttpUrl(suggested)) return suggested
  return placeholderImageUrl(category.label, identity)
}

type SummarizerOptions = {
  // null when no credential is configured; every call then fails softly
  generate: SummaryGenerator | null
  pacer: Pacer
  timeoutMs: number
}

export class Summarizer {
  constructor(private readonly opts: SummarizerOptions) {}

  /** Never throws. On any failure the original content comes back with failed=true */
  async summarize(input: SummarizeInput): Promise<SummaryResult> {
    const identity = input.link || input.title
    const failure = (): SummaryResult => ({
      summary: input.content,
      imageUrl: resolveImageUrl(input.imageHint, null, input.category, identity),
      failed: true,
    })

    const generate = this.opts.generate
    if (!generate) return failure()

    try {
      await this.opts.pacer.acquire()
      const raw = await generate({
        prompt: buildSummaryPrompt(input),
        abortSignal: AbortSignal.timeout(this.opts.timeoutMs),
      })
      const parsed = SummarySchema.safeParse(raw)
      if (!parsed.success) {
        console.warn(
          `⚠️  Unparsable summary for "${input.title.slice(0, 50)}": ${parsed.error.message}`
        )
        return failure()
      }
      const summary = sanitizeSummary(parsed.data.summary)
      if (!summary) {
        console.warn(`⚠️  Empty summary for "${input.title.slice(0, 50)}"`)
        return failure()
      }
      return {
        summary,
        imageUrl: resolveImageUrl(
          input.imageHint,
          parsed.data.suggestedImageUrl,
          input.category,
          identity
        ),
        failed: false,
      }
    } catch (error) {
      console.warn(
        `⚠️  Summarizer failed for "${input.title.slice(0, 50)}":`,
        error instanceof Error ? error.message : error
      )
      return failure()
    }
  }
}
