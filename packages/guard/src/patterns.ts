/**
 * Pattern library shared by guards
 *
 * Patterns are data (regex, literal or glob) so a guard's pattern set can be
 * listed, described and tested on its own. A pattern that cannot be compiled
 * matches everything: a broken safety pattern must block, not go quiet.
 */

import { createLogger } from '@hookwarden/core'
import ignore, { type Ignore } from 'ignore'
import { posix } from 'path'

const logger = createLogger('patterns')

export type Pattern =
	| { kind: 'regex'; source: string; flags: string; description?: string }
	| { kind: 'literal'; source: string; ignoreCase: boolean; description?: string }
	| { kind: 'glob'; source: string; description?: string }

export type PatternSet = readonly Pattern[]

export function regex(source: string, description?: string, flags: string = 'i'): Pattern {
	return { kind: 'regex', source, flags, description }
}

export function literal(source: string, description?: string, ignoreCase: boolean = false): Pattern {
	return { kind: 'literal', source, ignoreCase, description }
}

export function glob(source: string, description?: string): Pattern {
	return { kind: 'glob', source, description }
}

// Cache compiled patterns; null marks a pattern that failed to compile
const regexCache = new Map<string, RegExp | null>()
const globCache = new Map<string, Ignore | null>()
const reported = new Set<string>()

function reportInvalid(kind: string, source: string, error: unknown): void {
	const key = `${ kind }:${ source }`
	if (reported.has(key)) {return}
	reported.add(key)
	logger.warn({ kind, source, err: error instanceof Error ? error.message : String(error) }, 'invalid pattern treated as a match')
}

function getRegex(source: string, flags: string): RegExp | null {
	// Stateful flags would make test() depend on the previous call
	const safeFlags = flags.replace(/[gy]/g, '')
	const key = `${ safeFlags }/${ source }`
	const cached = regexCache.get(key)
	if (cached !== undefined) {return cached}

	let compiled: RegExp | null
	try {
		compiled = new RegExp(source, safeFlags)
	} catch (error) {
		reportInvalid('regex', source, error)
		compiled = null
	}
	regexCache.set(key, compiled)
	return compiled
}

function getGlob(source: string): Ignore | null {
	const cached = globCache.get(source)
	if (cached !== undefined) {return cached}

	let compiled: Ignore | null
	try {
		compiled = source.trim() ? ignore().add(source) : null
		if (!compiled) {reportInvalid('glob', source, new Error('empty glob'))}
	} catch (error) {
		reportInvalid('glob', source, error)
		compiled = null
	}
	globCache.set(source, compiled)
	return compiled
}

/**
 * Split a path into its segments, treating `\` as a separator
 */
export function pathSegments(path: string): string[] {
	return path.replace(/\\/g, '/').split('/').filter(seg => seg !== '' && seg !== '.')
}

/**
 * Path form the glob matcher accepts: relative, POSIX, no leading `../`
 */
function toGlobSubject(path: string): string | null {
	let subject = posix.normalize(path.replace(/\\/g, '/'))
	subject = subject.replace(/^\/+/, '')
	while (subject.startsWith('../')) {
		subject = subject.slice(3)
	}
	if (subject === '' || subject === '.' || subject === '..') {return null}
	return subject
}

/**
 * Glob match (gitignore syntax): `CLAUDE.md` matches at any depth,
 * `tests/**` only under a top-level `tests`
 */
export function matchesGlob(source: string, path: string): boolean {
	const compiled = getGlob(source)
	if (!compiled) {return true}

	const subject = toGlobSubject(path)
	if (subject === null) {return false}

	try {
		return compiled.ignores(subject)
	} catch (error) {
		reportInvalid('glob', source, error)
		return true
	}
}

/**
 * Does `text` match `pattern`?
 */
export function matches(pattern: Pattern, text: string): boolean {
	switch (pattern.kind) {
		case 'regex': {
			const compiled = getRegex(pattern.source, pattern.flags)
			return compiled === null || compiled.test(text)
		}
		case 'literal':
			return pattern.ignoreCase
				? text.toLowerCase().includes(pattern.source.toLowerCase())
				: text.includes(pattern.source)
		case 'glob':
			return matchesGlob(pattern.source, text)
	}
}

/**
 * Directory-boundary-safe component match.
 *
 * `component` (one or more segments, e.g. `build` or `.git/hooks`) must line
 * up with whole segments of `path`: `build` matches `build/` and
 * `a/build/file` but never `rebuild/file` or `build.sh`.
 */
export function matchesPathComponent(component: string, path: string, ignoreCase: boolean = false): boolean {
	const fold = (s: string): string => ignoreCase ? s.toLowerCase() : s
	const wanted = pathSegments(component).map(fold)
	if (wanted.length === 0) {
		reportInvalid('component', component, new Error('empty path component'))
		return true
	}

	const parts = pathSegments(path).map(fold)
	for (let i = 0; i + wanted.length <= parts.length; i++) {
		if (wanted.every((seg, j) => parts[i + j] === seg)) {
			return true
		}
	}
	return false
}

/**
 * Every pattern of `patterns` that matches `text`, in set order
 */
export function findMatches(patterns: PatternSet, text: string): Pattern[] {
	return patterns.filter(pattern => matches(pattern, text))
}

export function matchesAny(patterns: PatternSet, text: string): boolean {
	return patterns.some(pattern => matches(pattern, text))
}

export function describePattern(pattern: Pattern): string {
	return pattern.description ?? pattern.source
}
