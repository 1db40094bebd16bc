/**
 * Splits a command line into words. Quotes group words containing spaces,
 * a backslash escapes the next character outside single quotes, and an
 * unterminated quote runs to the end of input.
 */
export function tokenize(input: string): string[] {
    const tokens: string[] = []
    let current = ''
    let inToken = false
    let quote: '"' | "'" | null = null

    for (let i = 0; i < input.length; i++) {
        const ch = input.charAt(i)

        if (quote) {
            if (ch === quote) {
                quote = null
            } else if (ch === '\\' && quote === '"' && i + 1 < input.length) {
                current += input.charAt(++i)
            } else {
                current += ch
            }
            continue
        }

        if (ch === '"' || ch === "'") {
            quote = ch
            inToken = true
        } else if (ch === '\\' && i + 1 < input.length) {
            current += input.charAt(++i)
            inToken = true
        } else if (/\s/.test(ch)) {
            if (inToken) {
                tokens.push(current)
                current = ''
                inToken = false
            }
        } else {
            current += ch
            inToken = true
        }
    }

    if (inToken) tokens.push(current)
    return tokens
}
