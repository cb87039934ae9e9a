import { describe, expect, test } from 'vitest'

import {
	describePattern,
	findMatches,
	glob,
	literal,
	matches,
	matchesAny,
	matchesGlob,
	matchesPathComponent,
	pathSegments,
	regex
} from '../src/patterns.js'

describe('matchesPathComponent', () => {
	test('matches whole directory segments', () => {
		expect(matchesPathComponent('build', 'build/')).toBe(true)
		expect(matchesPathComponent('build', 'a/build/file')).toBe(true)
		expect(matchesPathComponent('build', '/abs/build')).toBe(true)
	})

	test('does not match inside a segment', () => {
		expect(matchesPathComponent('build', 'rebuild/file')).toBe(false)
		expect(matchesPathComponent('build', 'build.sh')).toBe(false)
		expect(matchesPathComponent('build', 'a/builder/file')).toBe(false)
	})

	test('matches multi-segment components in order', () => {
		expect(matchesPathComponent('.git/hooks', '/repo/.git/hooks/pre-commit')).toBe(true)
		expect(matchesPathComponent('.git/hooks', '/repo/.git/hooks-backup/pre-commit')).toBe(false)
		expect(matchesPathComponent('.git/hooks', '/repo/hooks/.git')).toBe(false)
	})

	test('treats backslashes as separators', () => {
		expect(matchesPathComponent('build', 'a\\build\\file')).toBe(true)
	})

	test('folds case only when asked', () => {
		expect(matchesPathComponent('Build', 'a/build/file')).toBe(false)
		expect(matchesPathComponent('Build', 'a/build/file', true)).toBe(true)
	})

	test('an empty component matches everything', () => {
		expect(matchesPathComponent('', 'any/path')).toBe(true)
	})
})

describe('pathSegments', () => {
	test('drops empty and dot segments', () => {
		expect(pathSegments('./a//b/./c/')).toEqual([ 'a', 'b', 'c' ])
	})
})

describe('matches', () => {
	test('regex patterns are case-insensitive by default', () => {
		expect(matches(regex('^install.*\\.sh$'), 'Install-Foo.SH')).toBe(true)
		expect(matches(regex('^install.*\\.sh$', undefined, ''), 'Install-Foo.SH')).toBe(false)
	})

	test('global regex flags do not carry state between calls', () => {
		const pattern = regex('skip', undefined, 'g')
		expect(matches(pattern, 'skip')).toBe(true)
		expect(matches(pattern, 'skip')).toBe(true)
	})

	test('literal patterns match substrings', () => {
		expect(matches(literal('--no-verify'), 'git commit --no-verify')).toBe(true)
		expect(matches(literal('SKIP'), 'skip')).toBe(false)
		expect(matches(literal('SKIP', undefined, true), 'skip')).toBe(true)
	})

	test('glob patterns use gitignore semantics', () => {
		expect(matches(glob('CLAUDE.md'), 'docs/CLAUDE.md')).toBe(true)
		expect(matches(glob('tests/**'), 'tests/unit/a.test.ts')).toBe(true)
		expect(matches(glob('tests/**'), 'src/tests/a.ts')).toBe(false)
		expect(matches(glob('*.sh'), 'scripts/run.py')).toBe(false)
	})
})

describe('fail-closed patterns', () => {
	test('an uncompilable regex matches everything', () => {
		expect(matches(regex('(unclosed'), 'harmless text')).toBe(true)
		expect(matchesAny([ regex('[z-a]') ], '')).toBe(true)
	})

	test('an empty glob matches everything', () => {
		expect(matchesGlob('   ', 'src/index.ts')).toBe(true)
	})

	test('a glob never matches the root itself', () => {
		expect(matchesGlob('*', '.')).toBe(false)
		expect(matchesGlob('*', '/')).toBe(false)
	})
})

describe('findMatches', () => {
	test('returns matching patterns in set order', () => {
		const set = [
			regex('^rm\\b', 'remove'),
			literal('-rf', 'recursive force'),
			regex('^ls\\b', 'list')
		]
		expect(findMatches(set, 'rm -rf build').map(describePattern)).toEqual([ 'remove', 'recursive force' ])
		expect(findMatches(set, 'echo hi')).toEqual([])
	})

	test('describePattern falls back to the source', () => {
		expect(describePattern(regex('^x$'))).toBe('^x$')
	})
})
