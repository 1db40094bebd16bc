import type { Navigator } from '../navigator/navigator.js'
import { closestMatches } from '../resolver/similarity.js'
import { tokenize } from '../resolver/tokenizer.js'
import type { CommandRegistry } from './registry.js'

/** Host programs offered next to the registry names. */
export const HOST_VOCABULARY: Readonly<Record<string, { flags: string[]; takesPaths: boolean }>> = {
    find: { flags: ['-name', '-type', '-size'], takesPaths: true },
    grep: { flags: ['-i', '-r', '-v', '-n'], takesPaths: true },
    ps: { flags: [], takesPaths: false },
}

function byText(a: string, b: string): number {
    if (a < b) return -1
    if (a > b) return 1
    return 0
}

/**
 * Completes the word under the cursor. Command names come first, then
 * directory entries; each group is sorted on its own.
 */
export class Autocompleter {
    private vocabulary: string[]

    constructor(
        private registry: CommandRegistry,
        private navigator: Navigator
    ) {
        this.vocabulary = [...new Set([...registry.names(), ...Object.keys(HOST_VOCABULARY)])].sort(byText)
    }

    async suggest(partial: string, cwd: string): Promise<string[]> {
        if (partial.trim() === '') return [...this.vocabulary]

        const words = tokenize(partial)
        if (/\s$/.test(partial)) words.push('')

        const [first = '', ...rest] = words
        if (rest.length === 0) {
            const prefix = first.toLowerCase()
            const names = this.vocabulary.filter((word) => word.startsWith(prefix))
            const paths = first.includes('/') ? await this.completePath(first, cwd) : []
            if (names.length === 0 && paths.length === 0) return closestMatches(prefix, this.vocabulary, 5, 0.5)
            return [...names, ...paths]
        }

        const name = first.toLowerCase()
        const last = rest[rest.length - 1] ?? ''
        const spec = this.registry.get(name) ?? HOST_VOCABULARY[name]
        if (!spec) return []

        if (last.startsWith('-')) {
            return spec.flags.filter((flag) => flag.startsWith(last)).sort(byText)
        }
        return spec.takesPaths ? this.completePath(last, cwd) : []
    }

    private async completePath(word: string, cwd: string): Promise<string[]> {
        const slash = word.lastIndexOf('/')
        const dirPart = word.slice(0, slash + 1)
        const namePrefix = word.slice(slash + 1)
        const base = dirPart ? this.navigator.resolve(cwd, dirPart) : cwd
        const showHidden = namePrefix.startsWith('.')

        const entries = await this.navigator.entries(base)
        return entries
            .filter((entry) => entry.name.startsWith(namePrefix) && (showHidden || !entry.name.startsWith('.')))
            .map((entry) => `${dirPart}${entry.name}${entry.isDirectory ? '/' : ''}`)
            .sort(byText)
    }
}
