import { describe, expect, it } from 'vitest'
import {
    ConfigError,
    DispatchError,
    NavigatorError,
    ResolutionError,
    ShellcastError,
    TransportError,
    errnoCode,
    errorMessage,
    toNavigatorError,
} from '../../../src/core/errors.js'

function errno(code: string): Error {
    return Object.assign(new Error(`${code}: failed`), { code })
}

describe('error classes', () => {
    it('carry category and code', () => {
        const resolution = new ResolutionError('nope', 'do it', ['do'])
        expect(resolution).toBeInstanceOf(ShellcastError)
        expect(resolution.category).toBe('resolution')
        expect(resolution.code).toBe('UnrecognizedIntent')
        expect(resolution.suggestions).toEqual(['do'])

        expect(new NavigatorError('Forbidden', 'no').category).toBe('navigator')
        expect(new DispatchError('Timeout', 'slow').code).toBe('Timeout')
        expect(new TransportError('gone').code).toBe('ChannelClosed')
        expect(new ConfigError('bad').name).toBe('ConfigError')
    })

    it('NavigatorError keeps a relocated directory', () => {
        const error = new NavigatorError('NotFound', 'rm: x', { newDirectory: '/tmp' })
        expect(error.newDirectory).toBe('/tmp')
        expect(new NavigatorError('NotFound', 'rm: x').newDirectory).toBeUndefined()
    })

    it('supports cause', () => {
        const cause = new Error('original')
        const error = new DispatchError('ExecutionFailed', 'wrapped', { cause })
        expect(error.cause).toBe(cause)
    })
})

describe('errnoCode', () => {
    it('reads string codes only', () => {
        expect(errnoCode(errno('ENOENT'))).toBe('ENOENT')
        expect(errnoCode({ code: 2 })).toBeUndefined()
        expect(errnoCode(null)).toBeUndefined()
        expect(errnoCode('ENOENT')).toBeUndefined()
    })
})

describe('errorMessage', () => {
    it('reads Error messages and stringifies the rest', () => {
        expect(errorMessage(new Error('boom'))).toBe('boom')
        expect(errorMessage(42)).toBe('42')
    })
})

describe('toNavigatorError', () => {
    it('maps errno codes to navigator codes and coreutils wording', () => {
        const cases: Array<[string, string, string]> = [
            ['ENOENT', 'NotFound', 'No such file or directory'],
            ['ENOTDIR', 'NotADirectory', 'Not a directory'],
            ['EEXIST', 'AlreadyExists', 'File exists'],
            ['ENOTEMPTY', 'InvalidArguments', 'Directory not empty'],
            ['EACCES', 'PermissionDenied', 'Permission denied'],
            ['EPERM', 'PermissionDenied', 'Operation not permitted'],
        ]
        for (const [code, expected, reason] of cases) {
            const error = toNavigatorError(errno(code), 'cd', 'docs')
            expect(error.code).toBe(expected)
            expect(error.message).toBe(`cd: docs: ${reason}`)
        }
    })

    it('falls back to the raw message', () => {
        const error = toNavigatorError(new Error('weird'), 'cp', "cannot copy 'a'")
        expect(error.code).toBe('InvalidArguments')
        expect(error.message).toBe("cp: cannot copy 'a': weird")
    })
})
