// ~3.5 chars per token. Good enough for budget tracking, not for exact billing
export function estimateTokens(text: string): number {
    return Math.ceil(text.length / 3.5)
}

interface PromptSection {
    label: string
    lines: string[]
    priority: number // higher = more important
    /** Trimmable sections lose their oldest lines first instead of being dropped whole. */
    trimmable: boolean
}

export class PromptBuilder {
    private sections: PromptSection[] = []

    add(label: string, content: string, priority = 50): this {
        this.sections.push({ label, lines: [content], priority, trimmable: false })
        return this
    }

    addLines(label: string, lines: string[], priority = 50): this {
        this.sections.push({ label, lines, priority, trimmable: true })
        return this
    }

    build(budget: number): string {
        const sorted = [...this.sections].sort((a, b) => b.priority - a.priority)
        const kept = new Map<PromptSection, string[]>()
        let used = 0

        for (const section of sorted) {
            if (!section.trimmable) {
                const tokens = estimateTokens(section.lines.join('\n'))
                if (used + tokens <= budget) {
                    kept.set(section, section.lines)
                    used += tokens
                }
                continue
            }

            let tail: string[] = []
            for (let i = section.lines.length - 1; i >= 0; i--) {
                const candidate = [section.lines[i] ?? '', ...tail]
                if (used + estimateTokens(candidate.join('\n')) > budget) break
                tail = candidate
            }
            if (tail.length > 0) {
                kept.set(section, tail)
                used += estimateTokens(tail.join('\n'))
            }
        }

        return this.sections
            .filter((s) => kept.has(s))
            .map((s) => `## ${s.label}\n\n${(kept.get(s) ?? []).join('\n')}`)
            .join('\n\n')
    }
}
