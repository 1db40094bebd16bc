import path from 'node:path'

export interface PathPolicy {
    /** Target of `cd` with no argument and of `~`. */
    home: string
    sandboxRoot?: string
}

export function isWithin(parent: string, child: string): boolean {
    const rel = path.relative(parent, child)
    return rel === '' || (rel !== '..' && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel))
}

/**
 * Resolves a user-typed path against the current directory. `~` and `~/x`
 * expand to the policy home; the result is absolute and normalized.
 */
export function resolvePath(cwd: string, target: string, policy: PathPolicy): string {
    if (target === '~') return path.resolve(policy.home)
    if (target.startsWith('~/')) return path.resolve(policy.home, target.slice(2))
    return path.resolve(cwd, target)
}

export function isFilesystemRoot(target: string): boolean {
    return path.parse(target).root === target
}

export function insideSandbox(target: string, policy: PathPolicy): boolean {
    return policy.sandboxRoot === undefined || isWithin(policy.sandboxRoot, target)
}
