export function editDistance(a: string, b: string): number {
    let prev = Array.from({ length: b.length + 1 }, (_, i) => i)
    for (let i = 1; i <= a.length; i++) {
        const curr = [i]
        for (let j = 1; j <= b.length; j++) {
            const cost = a.charAt(i - 1) === b.charAt(j - 1) ? 0 : 1
            curr[j] = Math.min((prev[j] ?? 0) + 1, (curr[j - 1] ?? 0) + 1, (prev[j - 1] ?? 0) + cost)
        }
        prev = curr
    }
    return prev[b.length] ?? 0
}

/** 1 for identical strings, 0 for nothing in common. */
export function similarity(a: string, b: string): number {
    const longest = Math.max(a.length, b.length)
    if (longest === 0) return 1
    return 1 - editDistance(a, b) / longest
}

export function closestMatches(word: string, vocabulary: Iterable<string>, limit = 3, cutoff = 0.6): string[] {
    const needle = word.toLowerCase()
    const scored: Array<{ candidate: string; score: number }> = []
    for (const candidate of new Set(vocabulary)) {
        const score = similarity(needle, candidate.toLowerCase())
        if (score >= cutoff) scored.push({ candidate, score })
    }
    scored.sort((x, y) => y.score - x.score || x.candidate.localeCompare(y.candidate))
    return scored.slice(0, limit).map((s) => s.candidate)
}
