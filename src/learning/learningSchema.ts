/**
 * Ingress validation for extraction replies.
 *
 * Two reply shapes are accepted: the multi-field shape (one field per learning
 * dimension) and the older unified shape (a single `learnings` string). Both are
 * normalized to LearningExtraction, so nothing downstream branches on shape.
 */

import { z } from 'zod'

const optionalText = z.string().nullable().optional()

export const antiPatternsSchema = z.object({
  description: z.string().default(''),
  redundancies: z.array(z.string()).default([]),
  inefficiencies: z.array(z.string()).default([]),
})

const decisionFields = {
  confidence_score: z.number().min(0).max(1).default(0.5),
  should_save: z.boolean().default(true),
  save_reason: optionalText,
}

export const multiFieldLearningSchema = z.object({
  tactical_learning: optionalText,
  strategic_learning: optionalText,
  meta_learning: optionalText,
  anti_patterns: antiPatternsSchema.nullable().optional(),
  ...decisionFields,
})

export const unifiedLearningSchema = z.object({
  learnings: z.string(),
  ...decisionFields,
})

export type AntiPatterns = z.infer<typeof antiPatternsSchema>

export type RawLearning =
  | { shape: 'multi'; data: z.infer<typeof multiFieldLearningSchema> }
  | { shape: 'unified'; data: z.infer<typeof unifiedLearningSchema> }

export interface LearningExtraction {
  tacticalLearning: string | null
  strategicLearning: string | null
  metaLearning: string | null
  antiPatterns: AntiPatterns | null
  confidenceScore: number
  shouldSave: boolean
  saveReason: string | null
}

function clean(text: string | null | undefined): string | null {
  const trimmed = text?.trim()
  return trimmed ? trimmed : null
}

/**
 * Identify the reply shape. A reply carrying `learnings` and no per-dimension
 * text is unified; anything else must satisfy the multi-field schema.
 */
export function identifyLearningShape(raw: unknown): RawLearning | null {
  const multi = multiFieldLearningSchema.safeParse(raw)
  const multiHasText =
    multi.success &&
    [multi.data.tactical_learning, multi.data.strategic_learning, multi.data.meta_learning].some(t => clean(t))

  if (!multiHasText) {
    const unified = unifiedLearningSchema.safeParse(raw)
    if (unified.success) return { shape: 'unified', data: unified.data }
  }
  return multi.success ? { shape: 'multi', data: multi.data } : null
}

const SECTION_LABEL = /^[ \t]*(tactical|strategic|meta)(?:[ \t]+learning)?[ \t]*:[ \t]*/gim

type Dimension = 'tactical' | 'strategic' | 'meta'

function isDimension(value: string): value is Dimension {
  return value === 'tactical' || value === 'strategic' || value === 'meta'
}

/**
 * Split unified text on "Tactical:", "Strategic:" and "Meta:" labels.
 * Unlabelled text (or text before the first label) counts as tactical.
 */
export function splitUnifiedLearnings(text: string): Record<Dimension, string | null> {
  const sections: Record<Dimension, string[]> = { tactical: [], strategic: [], meta: [] }
  const matches = [...text.matchAll(SECTION_LABEL)]

  const firstIndex = matches[0]?.index ?? text.length
  sections.tactical.push(text.slice(0, firstIndex))

  matches.forEach((match, i) => {
    const label = (match[1] ?? '').toLowerCase()
    const start = (match.index ?? 0) + match[0].length
    const end = matches[i + 1]?.index ?? text.length
    if (isDimension(label)) sections[label].push(text.slice(start, end))
  })

  const join = (parts: string[]) => clean(parts.map(p => p.trim()).filter(Boolean).join(' '))
  return {
    tactical: join(sections.tactical),
    strategic: join(sections.strategic),
    meta: join(sections.meta),
  }
}

export function normalizeLearning(raw: RawLearning): LearningExtraction {
  switch (raw.shape) {
    case 'multi': {
      const { data } = raw
      return {
        tacticalLearning: clean(data.tactical_learning),
        strategicLearning: clean(data.strategic_learning),
        metaLearning: clean(data.meta_learning),
        antiPatterns: data.anti_patterns ?? null,
        confidenceScore: data.confidence_score,
        shouldSave: data.should_save,
        saveReason: clean(data.save_reason),
      }
    }
    case 'unified': {
      const { data } = raw
      const split = splitUnifiedLearnings(data.learnings)
      return {
        tacticalLearning: split.tactical,
        strategicLearning: split.strategic,
        metaLearning: split.meta,
        antiPatterns: null,
        confidenceScore: data.confidence_score,
        shouldSave: data.should_save,
        saveReason: clean(data.save_reason),
      }
    }
  }
}

/**
 * Validate and normalize a raw reply. Anything malformed becomes a
 * negative save decision instead of an error.
 */
export function parseLearningReply(raw: unknown): LearningExtraction {
  const identified = identifyLearningShape(raw)
  if (!identified) {
    return {
      tacticalLearning: null,
      strategicLearning: null,
      metaLearning: null,
      antiPatterns: null,
      confidenceScore: 0,
      shouldSave: false,
      saveReason: 'Malformed extraction reply',
    }
  }
  return normalizeLearning(identified)
}

export function hasLearningContent(extraction: LearningExtraction): boolean {
  return Boolean(
    extraction.tacticalLearning ||
      extraction.strategicLearning ||
      extraction.metaLearning ||
      extraction.antiPatterns?.description.trim()
  )
}
