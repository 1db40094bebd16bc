import { ResolutionError } from '../core/errors.js'
import { err, ok, type Result } from '../core/result.js'
import type { ResolvedCommand } from '../core/types.js'
import { INTENT_RULES, type IntentRule } from './intents.js'
import { closestMatches } from './similarity.js'
import { tokenize } from './tokenizer.js'

export type Resolution = { kind: 'noop' } | { kind: 'command'; command: ResolvedCommand }

export interface ResolverOptions {
    marker?: string
    rules?: readonly IntentRule[]
    /** Words offered as "did you mean" candidates for unrecognized shorthand. */
    vocabulary?: Iterable<string>
}

const NOOP: Resolution = { kind: 'noop' }

/**
 * Turns raw input into a command. Only tokenizes and interprets shorthand:
 * whether a name is runnable is decided by the dispatcher.
 */
export class CommandResolver {
    private readonly marker: string
    private readonly rules: readonly IntentRule[]
    private readonly vocabulary: string[]

    constructor(options: ResolverOptions = {}) {
        this.marker = options.marker ?? '!'
        this.rules = options.rules ?? INTENT_RULES
        this.vocabulary = [...(options.vocabulary ?? defaultVocabulary(this.rules))]
    }

    resolve(raw: string): Result<Resolution, ResolutionError> {
        const input = raw.trim()
        if (input === '') return ok(NOOP)

        if (input.startsWith(this.marker)) {
            return this.interpret(input.slice(this.marker.length).trim())
        }

        return ok(toResolution(tokenize(input), false))
    }

    get examples(): Array<{ example: string; description: string }> {
        return this.rules.map(({ example, description }) => ({ example, description }))
    }

    private interpret(text: string): Result<Resolution, ResolutionError> {
        for (const rule of this.rules) {
            for (const pattern of rule.patterns) {
                const match = pattern.exec(text)
                if (!match) continue
                const words = expandTemplate(rule.template, match.groups ?? {})
                if (words.length === 0) return ok(NOOP)
                return ok(toResolution(words, true))
            }
        }
        return err(this.unrecognized(text))
    }

    private unrecognized(text: string): ResolutionError {
        const firstWord = text.split(/\s+/)[0] ?? ''
        const suggestions = firstWord ? closestMatches(firstWord, this.vocabulary) : []
        const hint = suggestions.length > 0 ? `Did you mean: ${suggestions.join(', ')}?` : "Type 'help' to see what is understood."
        const shown = text === '' ? this.marker : text
        return new ResolutionError(`Unrecognized request: ${shown}\n${hint}`, text, suggestions)
    }
}

function toResolution(words: string[], isNaturalLanguage: boolean): Resolution {
    const [name, ...args] = words
    if (name === undefined) return NOOP
    return { kind: 'command', command: { name, args, isNaturalLanguage } }
}

const PLACEHOLDER = /\{(\w+)\}/g
const SPLICE = /^\{\.\.\.(\w+)\}$/

export function expandTemplate(template: readonly string[], groups: Record<string, string | undefined>): string[] {
    const words: string[] = []
    for (const word of template) {
        const splice = SPLICE.exec(word)
        if (splice) {
            const value = groups[splice[1] ?? '']
            if (value !== undefined) words.push(...tokenize(value))
            continue
        }

        let missing = false
        const expanded = word.replace(PLACEHOLDER, (_, name: string) => {
            const value = groups[name]
            if (value === undefined) {
                missing = true
                return ''
            }
            return value
        })
        if (!missing) words.push(expanded)
    }
    return words
}

function defaultVocabulary(rules: readonly IntentRule[]): string[] {
    const words = new Set<string>()
    for (const rule of rules) {
        for (const word of rule.example.split(/\s+/)) {
            if (/^[a-z]+$/.test(word)) words.add(word)
        }
        const command = rule.template[0]
        if (command && /^[a-z]+$/.test(command)) words.add(command)
    }
    return [...words].sort()
}
