import { z } from 'zod'
import { APPROVAL_CATEGORIES, AUTO_CATEGORIES, type Category } from '../core/types.js'
import { err, ok, type Result } from '../core/result.js'

const MeetupSchema = z.object({
    confirmed: z.boolean(),
    timeText: z.string(),
})

const ReasonerOutputSchema = z
    .object({
        classification: z.enum(['auto', 'needs-approval']),
        category: z.string().optional(),
        categories: z.array(z.string()).optional(),
        proposedReply: z.string().nullish(),
        intentLabel: z.string().nullish(),
        ownerNotes: z.string().nullish(),
        meetup: MeetupSchema.nullish(),
    })
    .refine((data) => data.category !== undefined || (data.categories?.length ?? 0) > 0, {
        message: 'category is required',
    })

export type ReasonerOutput = z.infer<typeof ReasonerOutputSchema>

const KNOWN = new Set<string>([...AUTO_CATEGORIES, ...APPROVAL_CATEGORIES])
const AUTO = new Set<string>(AUTO_CATEGORIES)

export function isCategory(value: string): value is Category {
    return KNOWN.has(value)
}

export function isAutoCategory(value: Category): boolean {
    return AUTO.has(value)
}

export function extractJSON(raw: unknown): unknown | null {
    if (raw === null || raw === undefined) return null
    if (typeof raw !== 'string') return raw

    // Try parsing the whole string first (most common case)
    try {
        return JSON.parse(raw)
    } catch {
        // Fall through to balanced brace extraction
    }

    const startIdx = raw.indexOf('{')
    if (startIdx === -1) return null

    let depth = 0
    for (let i = startIdx; i < raw.length; i++) {
        if (raw[i] === '{') depth++
        else if (raw[i] === '}') depth--
        if (depth === 0) {
            try {
                return JSON.parse(raw.slice(startIdx, i + 1))
            } catch {
                return null
            }
        }
    }
    return null
}

export function parseReasonerOutput(raw: unknown): Result<ReasonerOutput> {
    const parsed = extractJSON(raw)
    if (!parsed || typeof parsed !== 'object') return err('no JSON object in reasoner output')
    const result = ReasonerOutputSchema.safeParse(parsed)
    if (!result.success) {
        const issue = result.error.issues[0]
        return err(issue ? `${issue.path.join('.') || 'output'}: ${issue.message}` : 'invalid reasoner output')
    }
    return ok(result.data)
}

/** Every category the output names, in order, with duplicates removed. */
export function namedCategories(output: ReasonerOutput): string[] {
    const names = [...(output.category !== undefined ? [output.category] : []), ...(output.categories ?? [])]
    return [...new Set(names.map((name) => name.trim().toLowerCase()))]
}
