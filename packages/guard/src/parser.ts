/**
 * Shell command decomposition for guards
 *
 * Commands are parsed with bash-parser. When it rejects the text (heredocs,
 * `[[`, unbalanced quotes) a separator-splitting tokenizer takes over, so a
 * parse failure never hides a command from the guards.
 *
 * Commands run indirectly are listed too: `$(...)` and backtick
 * substitutions, `sh -c` and `eval` scripts, and the command behind a
 * wrapper such as `sudo`, `env` or `xargs`.
 */

import parse from 'bash-parser'
import { posix } from 'path'

import type { ASTNode, CommandInfo } from './types.js'

export function isASTNode(value: unknown): value is ASTNode {
	return typeof value === 'object' && value !== null && 'type' in value && typeof value.type === 'string'
}

/**
 * Extract all commands from AST (handles pipelines, lists, compound commands)
 */
export function extractCommands(node: ASTNode | null | undefined): CommandInfo[] {
	if (!node) {return []}

	const commands: CommandInfo[] = []

	switch (node.type) {
		case 'Script':
		case 'Pipeline':
		case 'CompoundList':
			for (const cmd of node.commands || []) {
				commands.push(...extractCommands(cmd))
			}
			break

		case 'LogicalExpression':
			commands.push(...extractCommands(node.left))
			commands.push(...extractCommands(node.right))
			break

		case 'Command': {
			const parsed = parseCommand(node)
			if (parsed) {commands.push(parsed)}
			commands.push(...substitutedCommands(node))
			break
		}

		case 'Subshell':
			commands.push(...extractCommands(node.list))
			break

		case 'If':
			commands.push(...extractCommands(node.clause))
			commands.push(...extractCommands(node.then))
			commands.push(...extractCommands(node.else))
			break

		case 'While':
		case 'Until':
			commands.push(...extractCommands(node.clause))
			commands.push(...extractCommands(node.do))
			break

		case 'For':
			commands.push(...extractCommands(node.do))
			break

		case 'Function':
			commands.push(...extractCommands(node.body))
			break
	}

	return commands
}

/**
 * Commands inside `$(...)` and backtick substitutions of a Command node's words
 */
function substitutedCommands(node: ASTNode): CommandInfo[] {
	const parts = [ ...node.prefix || [], ...node.suffix || [] ]
	const expansions = [
		...node.name?.expansion || [],
		...parts.flatMap(part => [ ...part.expansion || [], ...part.file?.expansion || [] ])
	]

	return expansions.flatMap(expansion => {
		if (expansion.type !== 'CommandExpansion') {return []}
		if (expansion.commandAST) {return extractCommands(expansion.commandAST)}
		return expansion.command ? decompose(expansion.command) : []
	})
}

function emptyInfo(cmd: string): CommandInfo {
	return { cmd, args: [], flags: [], paths: [], raw: [], redirects: [], assignments: [] }
}

/**
 * Sort one word into flags, args and paths
 */
function addWord(info: CommandInfo, text: string): void {
	info.raw.push(text)

	if (text.startsWith('--') && text.length > 2) {
		// Long flag: --force, --no-verify=1
		info.flags.push(text.slice(2).split('=')[0])
	} else if (
		text.startsWith('-') &&
		text.length > 1 &&
		!/^-[\d.]+$/.test(text)
	) {
		// Short flags: -rf, -f, -r (but not negative numbers like -1)
		for (const f of text.slice(1)) {
			info.flags.push(f)
		}
	} else {
		info.args.push(text)
		if (/^[/~$.]/.test(text)) {
			info.paths.push(text)
		}
	}
}

// Global git options that take the next word as their value
const GIT_VALUE_OPTIONS = new Set([ '-C', '-c', '--git-dir', '--work-tree', '--namespace' ])

function finish(info: CommandInfo): CommandInfo {
	// Handle git subcommands, past `git -C dir` and friends
	if (info.cmd === 'git') {
		for (let i = 0; i < info.raw.length; i++) {
			const word = info.raw[i]
			if (GIT_VALUE_OPTIONS.has(word)) {
				i++
			} else if (!word.startsWith('-')) {
				info.subcommand = word
				info.subArgs = info.raw.slice(i + 1).filter(arg => !arg.startsWith('-'))
				break
			}
		}
	}
	return info
}

/**
 * Parse a Command node into structured info
 */
export function parseCommand(node: ASTNode): CommandInfo | null {
	if (!node.name?.text && !node.prefix?.length) {return null}

	const info = emptyInfo(node.name?.text ?? '')

	for (const part of [ ...node.prefix || [], ...node.suffix || [] ]) {
		if (part.type === 'Redirect') {
			const op = typeof part.op === 'string' ? part.op : part.op?.text
			if (part.file?.text && op && /^>[>|]?$|^&>>?$/.test(op)) {
				info.redirects.push(part.file.text)
			}
		} else if (part.type === 'AssignmentWord' && part.text) {
			info.assignments.push(part.text)
		} else if (part.text) {
			addWord(info, part.text)
		}
	}

	return finish(info)
}

/**
 * Split a command line into words, honouring quotes and backslashes, with
 * `;`, `&`, `|` and newlines as separators between commands
 */
function tokenize(command: string): string[][] {
	const segments: string[][] = []
	let words: string[] = []
	let word = ''
	let inWord = false
	let quote: '\'' | '"' | null = null

	const endWord = (): void => {
		if (inWord) {words.push(word)}
		word = ''
		inWord = false
	}
	const endSegment = (): void => {
		endWord()
		if (words.length > 0) {segments.push(words)}
		words = []
	}

	for (let i = 0; i < command.length; i++) {
		const ch = command[i]

		if (quote) {
			if (ch === quote) {
				quote = null
			} else if (ch === '\\' && quote === '"' && i + 1 < command.length) {
				word += command[++i]
			} else {
				word += ch
			}
			continue
		}

		if (ch === '\'' || ch === '"') {
			quote = ch
			inWord = true
		} else if (ch === '\\' && i + 1 < command.length) {
			word += command[++i]
			inWord = true
		} else if (ch === ';' || ch === '&' || ch === '|' || ch === '\n') {
			// `>|` and `&>` belong to a redirect, not a separator
			if ((ch === '|' && word === '>') || (ch === '&' && command[i + 1] === '>')) {
				word += ch
				inWord = true
			} else {
				endSegment()
			}
		} else if (ch === ' ' || ch === '\t') {
			endWord()
		} else {
			word += ch
			inWord = true
		}
	}
	endSegment()

	return segments
}

/**
 * Fallback decomposition for text bash-parser rejects
 */
export function tokenizeCommands(command: string): CommandInfo[] {
	const commands: CommandInfo[] = []

	for (const words of tokenize(command)) {
		const info = emptyInfo('')
		let i = 0

		while (i < words.length && /^[A-Za-z_][A-Za-z0-9_]*=/.test(words[i])) {
			info.assignments.push(words[i++])
		}

		for (; i < words.length; i++) {
			const text = words[i]
			const redirect = /^(?:\d?>[>|]?|&>>?)(.*)$/.exec(text)
			if (redirect) {
				const target = redirect[1] || words[++i]
				if (target) {info.redirects.push(target)}
			} else if (!info.cmd) {
				info.cmd = text
			} else {
				addWord(info, text)
			}
		}

		if (info.cmd || info.assignments.length > 0) {
			commands.push(finish(info))
		}
	}

	return commands
}

/**
 * Bodies of the `$(...)` and backtick substitutions in `command`, outermost
 * first. Quoting is not tracked, so a quoted `$(` still counts.
 */
export function substitutionBodies(command: string): string[] {
	const bodies: string[] = []

	for (let i = 0; i < command.length; i++) {
		if (command[i] === '`') {
			const end = command.indexOf('`', i + 1)
			if (end === -1) {break}
			bodies.push(command.slice(i + 1, end))
			i = end
		} else if (command.startsWith('$(', i)) {
			let depth = 1
			let j = i + 2
			for (; j < command.length && depth > 0; j++) {
				if (command[j] === '(') {
					depth++
				} else if (command[j] === ')') {
					depth--
				}
			}
			bodies.push(command.slice(i + 2, depth === 0 ? j - 1 : j))
			i = j - 1
		}
	}

	return bodies
}

/**
 * Simple commands of one command line, substitutions included
 */
function decompose(command: string): CommandInfo[] {
	let ast: unknown
	try {
		ast = parse(command)
	} catch {
		ast = null
	}
	if (isASTNode(ast)) {return extractCommands(ast)}

	return [
		...tokenizeCommands(command),
		...substitutionBodies(command).flatMap(decompose)
	]
}

const SHELLS = new Set([ 'sh', 'bash', 'zsh', 'dash', 'ksh' ])

interface WrapperSpec {
	/** Options that take the next word as their value */
	valueOptions: readonly string[];
	/** Positional words before the wrapped command (`timeout 5 cmd`) */
	positionals?: number;
	/** Leading NAME=value words are assignments for the wrapped command */
	assignments?: boolean;
}

const WRAPPERS = new Map<string, WrapperSpec>([
	[ 'sudo', { valueOptions: [ '-u', '-g', '-h', '-p', '-C', '-D', '-r', '-t', '-U', '--user', '--group', '--host', '--prompt', '--chdir' ] } ],
	[ 'doas', { valueOptions: [ '-u', '-C' ] } ],
	[ 'env', { valueOptions: [ '-u', '-C', '--unset', '--chdir' ], assignments: true } ],
	[ 'command', { valueOptions: [] } ],
	[ 'builtin', { valueOptions: [] } ],
	[ 'exec', { valueOptions: [ '-a' ] } ],
	[ 'time', { valueOptions: [ '-f', '-o', '--format', '--output' ] } ],
	[ 'nohup', { valueOptions: [] } ],
	[ 'nice', { valueOptions: [ '-n', '--adjustment' ] } ],
	[ 'timeout', { valueOptions: [ '-s', '-k', '--signal', '--kill-after' ], positionals: 1 } ],
	[ 'stdbuf', { valueOptions: [ '-i', '-o', '-e' ] } ],
	[ 'xargs', { valueOptions: [ '-I', '-n', '-L', '-P', '-d', '-E', '-s', '-a', '--max-args', '--max-procs', '--delimiter', '--arg-file', '--replace' ] } ]
])

const ASSIGNMENT = /^[A-Za-z_][A-Za-z0-9_]*=/

// Shell-in-shell depth worth following
const MAX_NESTING = 8

function commandName(cmd: string): string {
	return posix.basename(cmd)
}

function fromWords(words: string[], assignments: string[]): CommandInfo {
	const info = emptyInfo(words[0])
	info.assignments.push(...assignments)
	for (const word of words.slice(1)) {
		addWord(info, word)
	}
	return finish(info)
}

/**
 * The command a wrapper runs, without the wrapper and its options
 */
export function unwrapCommand(info: CommandInfo): CommandInfo | null {
	const spec = WRAPPERS.get(commandName(info.cmd))
	if (!spec) {return null}

	// Prefix assignments reach the wrapped command's environment
	const assignments = [ ...info.assignments ]
	let positionals = spec.positionals ?? 0
	let i = 0
	for (; i < info.raw.length; i++) {
		const word = info.raw[i]
		if (word === '--') {
			i++
			break
		}
		if (word.startsWith('-') && word.length > 1) {
			if (spec.valueOptions.includes(word)) {i++}
		} else if (spec.assignments && ASSIGNMENT.test(word)) {
			assignments.push(word)
		} else if (positionals > 0) {
			positionals--
		} else {
			break
		}
	}

	const words = info.raw.slice(i)
	return words.length > 0 ? fromWords(words, assignments) : null
}

/**
 * Script text a command hands to a shell: `bash -c '<script>'`, `eval <words>`
 */
export function shellScript(info: CommandInfo): string | null {
	const name = commandName(info.cmd)
	if (name === 'eval') {
		return info.raw.length > 0 ? info.raw.join(' ') : null
	}
	if (!SHELLS.has(name)) {return null}

	const at = info.raw.findIndex(word => /^-[a-zA-Z]*c[a-zA-Z]*$/.test(word))
	return at === -1 || at + 1 >= info.raw.length ? null : unquote(info.raw[at + 1])
}

/** Drop one pair of enclosing quotes the parser left in place */
function unquote(word: string): string {
	return /^(["']).*\1$/s.test(word) ? word.slice(1, -1) : word
}

function expand(commands: CommandInfo[], depth: number): CommandInfo[] {
	return commands.flatMap(info => [ info, ...nestedCommands(info, depth) ])
}

function nestedCommands(info: CommandInfo, depth: number): CommandInfo[] {
	if (depth >= MAX_NESTING) {return []}

	const script = shellScript(info)
	if (script !== null) {return expand(decompose(script), depth + 1)}

	const inner = unwrapCommand(info)
	return inner ? expand([ inner ], depth + 1) : []
}

/**
 * Decompose a shell command line into its simple commands, followed by the
 * commands each one runs indirectly
 */
export function parseShell(command: string): CommandInfo[] {
	return expand(decompose(command), 0)
}

export interface WriteTarget {
	path: string;
	action: 'write' | 'delete';
}

const DELETE_COMMANDS = new Set([ 'rm', 'unlink', 'shred' ])
const TOUCH_COMMANDS = new Set([ 'tee', 'touch', 'truncate' ])
const COPY_COMMANDS = new Set([ 'cp', 'install', 'ln', 'rsync' ])

/**
 * Files a command creates, modifies or deletes
 */
export function writeTargets(info: CommandInfo): WriteTarget[] {
	const targets: WriteTarget[] = info.redirects.map(path => ({ path, action: 'write' }))
	const { cmd, args } = info

	if (TOUCH_COMMANDS.has(cmd)) {
		targets.push(...args.map(path => ({ path, action: 'write' as const })))
	} else if (COPY_COMMANDS.has(cmd) && args.length >= 2) {
		targets.push({ path: args[args.length - 1], action: 'write' })
	} else if (cmd === 'mv' && args.length >= 2) {
		targets.push(...args.slice(0, -1).map(path => ({ path, action: 'delete' as const })))
		targets.push({ path: args[args.length - 1], action: 'write' })
	} else if (DELETE_COMMANDS.has(cmd)) {
		targets.push(...args.map(path => ({ path, action: 'delete' as const })))
	} else if (cmd === 'sed' && (info.flags.includes('i') || info.flags.includes('in-place'))) {
		// First argument is the sed script
		targets.push(...args.slice(1).map(path => ({ path, action: 'write' as const })))
	}

	return targets
}
