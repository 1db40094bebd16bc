/**
 * Natural-language shorthand rules. Evaluated top to bottom; the first rule
 * with a pattern matching the whole text wins. Patterns are case-insensitive
 * and captures keep the user's casing.
 *
 * Template words may reference named captures as `{name}`. A word whose
 * capture did not participate in the match is dropped, and `{...name}`
 * splices the capture in as an ordinary tokenized command line.
 */
export interface IntentRule {
    id: string
    patterns: RegExp[]
    template: string[]
    example: string
    description: string
}

export const INTENT_RULES: readonly IntentRule[] = [
    {
        id: 'create-file',
        patterns: [/^(?:create|make) (?:an? )?(?:new )?(?:empty )?file (?:called |named )?(?<file>\S+)$/i],
        template: ['touch', '{file}'],
        example: 'create file notes.txt',
        description: 'Creates a new empty file',
    },
    {
        id: 'create-directory',
        patterns: [/^(?:create|make) (?:an? )?(?:new )?(?:directory|folder) (?:called |named )?(?<dir>\S+)$/i],
        template: ['mkdir', '{dir}'],
        example: 'create folder documents',
        description: 'Creates a new directory',
    },
    {
        id: 'list-directory',
        patterns: [
            /^(?:show|display|list)(?: all)?(?: the)? (?:files|contents|directory|folder)(?: (?:in|of)(?: the)?(?: (?:directory|folder))?)?(?: (?<path>\S+))?$/i,
            /^what(?:'s| is) in(?: the)? (?:directory|folder)(?: (?<path>\S+))?\??$/i,
        ],
        template: ['ls', '{path}'],
        example: 'list files',
        description: 'Shows files in the current directory',
    },
    {
        id: 'show-file',
        patterns: [
            /^(?:show|display|print|read)(?: the)?(?: contents of)?(?: the)? file (?<file>\S+)$/i,
            /^what(?:'s| is) in(?: the)? file (?<file>\S+?)\??$/i,
        ],
        template: ['cat', '{file}'],
        example: 'show file notes.txt',
        description: 'Displays the contents of a file',
    },
    {
        id: 'remove-directory',
        patterns: [
            /^(?:remove|delete)(?: the)? (?:directory|folder) (?<dir>\S+)(?: and (?:all )?its contents| recursively)?$/i,
        ],
        template: ['rm', '-r', '{dir}'],
        example: 'delete folder old-logs',
        description: 'Removes a directory and everything in it',
    },
    {
        id: 'delete-by-extension',
        patterns: [/^(?:find and )?delete all (?<ext>\w+) files$/i],
        template: ['find', '.', '-name', '*.{ext}', '-delete'],
        example: 'delete all tmp files',
        description: 'Deletes every file with the given extension below here',
    },
    {
        id: 'remove-file',
        patterns: [/^(?:remove|delete)(?: the)?(?: file)? (?<file>\S+)$/i],
        template: ['rm', '{file}'],
        example: 'delete file notes.txt',
        description: 'Removes a file',
    },
    {
        id: 'copy-directory',
        patterns: [/^copy(?: the)? (?:directory|folder) (?<src>\S+)(?: and (?:all )?its contents)? to (?<dest>\S+)$/i],
        template: ['cp', '-r', '{src}', '{dest}'],
        example: 'copy folder src to src-backup',
        description: 'Copies a directory recursively',
    },
    {
        id: 'copy-file',
        patterns: [/^copy(?: the)?(?: file)? (?<src>\S+) to (?<dest>\S+)$/i],
        template: ['cp', '{src}', '{dest}'],
        example: 'copy notes.txt to backup.txt',
        description: 'Copies a file',
    },
    {
        id: 'backup-file',
        patterns: [/^create (?:a )?backup of(?: the)?(?: file)? (?<file>\S+)$/i],
        template: ['cp', '{file}', '{file}.bak'],
        example: 'create backup of file important.txt',
        description: 'Creates a .bak copy of a file',
    },
    {
        id: 'move',
        patterns: [/^(?:move|rename)(?: the)?(?: file)? (?<src>\S+) to (?<dest>\S+)$/i],
        template: ['mv', '{src}', '{dest}'],
        example: 'move notes.txt to documents/',
        description: 'Moves or renames a file',
    },
    {
        id: 'go-up',
        patterns: [/^go (?:back|up)(?: one level)?$/i, /^go to(?: the)? parent(?: directory| folder)?$/i],
        template: ['cd', '..'],
        example: 'go back',
        description: 'Goes up one directory level',
    },
    {
        id: 'go-home',
        patterns: [/^go(?: to)?(?: the)? home(?: directory| folder)?$/i],
        template: ['cd', '~'],
        example: 'go home',
        description: 'Returns to the home directory',
    },
    {
        id: 'change-directory',
        patterns: [
            /^(?:change|switch)(?: to)?(?: the)? (?:directory|folder)(?: to)? (?<dir>.+)$/i,
            /^go to(?: the)? (?:directory|folder) (?<dir>.+)$/i,
            /^cd(?: to)? (?<dir>.+)$/i,
        ],
        template: ['cd', '{dir}'],
        example: 'change directory documents',
        description: 'Changes to a different directory',
    },
    {
        id: 'current-directory',
        patterns: [
            /^(?:show|display|print)(?: the)? current (?:directory|folder|path)$/i,
            /^where am i\??$/i,
            /^what (?:directory|folder|path) am i in\??$/i,
        ],
        template: ['pwd'],
        example: 'where am i',
        description: 'Shows the current path',
    },
    {
        id: 'find-by-name',
        patterns: [/^(?:find|search for|locate)(?: all)? files (?:named|called) (?<name>\S+)$/i],
        template: ['find', '.', '-name', '{name}'],
        example: 'find files named *.txt',
        description: 'Searches for files by name',
    },
    {
        id: 'find-by-content',
        patterns: [
            /^(?:find|search for)(?: all)? files containing(?: the)?(?: text| string| pattern)? (?<pattern>\S+)$/i,
            /^grep(?: for)? (?<pattern>\S+)$/i,
        ],
        template: ['grep', '-r', '{pattern}', '.'],
        example: 'find files containing hello',
        description: 'Searches for text in files',
    },
    {
        id: 'cpu',
        patterns: [
            /^(?:show|display)(?: the)?(?: system)? (?:cpu|processor)(?: information| info| usage| stats)?$/i,
            /^how(?: is|'s)(?: the)? (?:cpu|processor)(?: doing)?\??$/i,
            /^what(?:'s| is)(?: the)? (?:cpu|processor) (?:usage|load)\??$/i,
        ],
        template: ['cpu'],
        example: 'show cpu usage',
        description: 'Displays CPU usage',
    },
    {
        id: 'memory',
        patterns: [
            /^(?:show|display)(?: the)?(?: system)? memory(?: information| info| usage| stats)?$/i,
            /^how(?: is|'s)(?: the)? memory(?: doing)?\??$/i,
            /^what(?:'s| is)(?: the)? memory (?:usage|load)\??$/i,
        ],
        template: ['memory'],
        example: 'show memory usage',
        description: 'Displays memory usage',
    },
    {
        id: 'processes',
        patterns: [
            /^(?:show|display|list)(?: the)?(?: running)? processes$/i,
            /^what processes are running\??$/i,
            /^what(?:'s| is) running\??$/i,
        ],
        template: ['processes'],
        example: 'list processes',
        description: 'Shows the number of running processes',
    },
    {
        id: 'top',
        patterns: [
            /^(?:show|display)(?: the)? top (?:processes|process list)$/i,
            /^(?:show|display)(?: the)? system (?:information|info|status)$/i,
        ],
        template: ['top'],
        example: 'show top processes',
        description: 'Shows the busiest processes',
    },
    {
        id: 'compress-directory',
        patterns: [/^compress(?: the)? (?:directory|folder) (?<dir>\S+)$/i],
        template: ['tar', '-czvf', '{dir}.tar.gz', '{dir}'],
        example: 'compress folder logs',
        description: 'Packs a directory into a .tar.gz archive',
    },
    {
        id: 'run',
        patterns: [/^(?:run|execute) (?<command>.+)$/i],
        template: ['{...command}'],
        example: 'run git status',
        description: 'Runs the rest of the line as a command',
    },
]
