import pc from 'picocolors'

export const colors = {
    brand: (text: string) => pc.magenta(pc.bold(text)),
    success: (text: string) => pc.green(text),
    error: (text: string) => pc.red(text),
    warn: (text: string) => pc.yellow(text),
    dim: (text: string) => pc.dim(text),
    bold: (text: string) => pc.bold(text),
    url: (text: string) => pc.cyan(pc.underline(text)),
}

export const VERSION = '0.1.0'

export function banner(): string {
    return `${colors.brand('shellcast')} ${colors.dim(`v${VERSION}`)} - browser terminal server`
}

/** Wildcard binds are shown as localhost so the URL can be opened. */
export function listeningUrl(host: string, port: number): string {
    const shown = host === '0.0.0.0' || host === '::' ? 'localhost' : host.includes(':') ? `[${host}]` : host
    return `http://${shown}:${port}`
}

export interface StartupInfo {
    host: string
    port: number
    rootDirectory: string
    sandboxRoot?: string
    passthrough: boolean
}

export function formatStartup(info: StartupInfo): string {
    const lines = [
        banner(),
        '',
        `  ${colors.bold('Listening')}  ${colors.url(listeningUrl(info.host, info.port))}`,
        `  ${colors.bold('Root')}       ${info.rootDirectory}`,
        `  ${colors.bold('Sandbox')}    ${info.sandboxRoot ?? colors.dim('none')}`,
    ]
    if (!info.passthrough) lines.push(`  ${colors.warn('Host programs disabled')}`)
    lines.push('', colors.dim('Press Ctrl+C to stop'))
    return lines.join('\n')
}

export function formatError(message: string): string {
    return `${colors.error('Error:')} ${message}`
}
