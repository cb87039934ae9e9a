import { describe, expect, test } from 'vitest'

import {
	extractCommands,
	parseShell,
	shellScript,
	substitutionBodies,
	tokenizeCommands,
	unwrapCommand,
	writeTargets
} from '../src/parser.js'

function targetsOf(command: string): string[] {
	return parseShell(command).flatMap(writeTargets).map(target => `${ target.action }:${ target.path }`)
}

describe('parseShell', () => {
	test('splits lists, pipelines and logical expressions', () => {
		const commands = parseShell('cd src && rm -rf build | tee log.txt; FOO=1 make')
		expect(commands.map(c => c.cmd)).toEqual([ 'cd', 'rm', 'tee', 'make' ])
		expect(commands[3].assignments).toEqual([ 'FOO=1' ])
	})

	test('sorts words into flags, args and paths', () => {
		const [ info ] = parseShell('rm -rf --no-preserve-root /tmp/x build -1')
		expect(info.flags).toEqual([ 'r', 'f', 'no-preserve-root' ])
		expect(info.args).toEqual([ '/tmp/x', 'build', '-1' ])
		expect(info.paths).toEqual([ '/tmp/x' ])
	})

	test('collects output redirects', () => {
		expect(parseShell('echo hi > out.txt')[0].redirects).toEqual([ 'out.txt' ])
		expect(parseShell('echo hi >> log.txt')[0].redirects).toEqual([ 'log.txt' ])
		expect(parseShell('sort < in.txt')[0].redirects).toEqual([])
	})

	test('finds the git subcommand past global options', () => {
		const [ info ] = parseShell('git -C repo commit -m msg --no-verify')
		expect(info.subcommand).toBe('commit')
		expect(info.subArgs).toEqual([ 'msg' ])
		expect(info.flags).toEqual([ 'C', 'm', 'no-verify' ])
	})

	test('returns nothing for an empty line', () => {
		expect(parseShell('')).toEqual([])
	})
})

describe('parseShell indirect commands', () => {
	const names = (command: string): string[] => parseShell(command).map(c => c.cmd)

	test('follows sh -c and bash -c scripts', () => {
		const commands = parseShell('bash -c "git commit --no-verify -m x"')
		expect(commands.map(c => c.cmd)).toEqual([ 'bash', 'git' ])
		expect(commands[1].subcommand).toBe('commit')
		expect(commands[1].flags).toEqual([ 'no-verify', 'm' ])
		expect(names('sh -c "git push --force origin main"')).toEqual([ 'sh', 'git' ])
		expect(names('zsh -lc "rm -rf .git/hooks"')).toEqual([ 'zsh', 'rm' ])
	})

	test('follows eval', () => {
		const commands = parseShell('eval "git push -f origin main"')
		expect(commands.map(c => c.cmd)).toEqual([ 'eval', 'git' ])
		expect(commands[1].flags).toEqual([ 'f' ])
	})

	test('follows command substitutions', () => {
		const commands = parseShell('echo $(git push --force origin main)')
		expect(commands.map(c => c.cmd)).toEqual([ 'echo', 'git' ])
		expect(commands[1].subArgs).toEqual([ 'origin', 'main' ])
		expect(names('echo `git push -f`')).toEqual([ 'echo', 'git' ])
	})

	test('strips wrappers and their options', () => {
		expect(names('sudo git push --force origin main')).toEqual([ 'sudo', 'git' ])
		expect(names('timeout 5 git push -f')).toEqual([ 'timeout', 'git' ])
		expect(names('nohup git push -f')).toEqual([ 'nohup', 'git' ])
		expect(names('ls | xargs -n 1 rm')).toEqual([ 'ls', 'xargs', 'rm' ])
	})

	test('env hands its assignments to the wrapped command', () => {
		const commands = parseShell('env FOO=1 git commit --no-verify -m x')
		expect(commands.map(c => c.cmd)).toEqual([ 'env', 'git' ])
		expect(commands[1].assignments).toEqual([ 'FOO=1' ])
		expect(commands[1].flags).toEqual([ 'no-verify', 'm' ])
	})

	test('unwraps nested wrappers', () => {
		const commands = parseShell('sudo -u root env SKIP=1 git commit -m x')
		expect(commands.map(c => c.cmd)).toEqual([ 'sudo', 'env', 'git' ])
		expect(commands[2].assignments).toEqual([ 'SKIP=1' ])
	})

	test('sees redirects inside a shell script', () => {
		expect(targetsOf('bash -c "echo x > install-evil.sh"')).toEqual([ 'write:install-evil.sh' ])
	})
})

describe('shellScript', () => {
	test('reads the -c argument of a shell', () => {
		const [ info ] = tokenizeCommands('/bin/sh -ec \'make test\'')
		expect(shellScript(info)).toBe('make test')
	})

	test('joins the words of eval', () => {
		const [ info ] = tokenizeCommands('eval git status')
		expect(shellScript(info)).toBe('git status')
	})

	test('ignores shells running a file', () => {
		const [ info ] = tokenizeCommands('bash run_tests.sh')
		expect(shellScript(info)).toBeNull()
	})
})

describe('unwrapCommand', () => {
	test('returns null for plain commands and bare wrappers', () => {
		expect(unwrapCommand(tokenizeCommands('git status')[0])).toBeNull()
		expect(unwrapCommand(tokenizeCommands('env')[0])).toBeNull()
	})

	test('stops option parsing at --', () => {
		const inner = unwrapCommand(tokenizeCommands('sudo -- -weird-name arg')[0])
		expect(inner?.cmd).toBe('-weird-name')
		expect(inner?.args).toEqual([ 'arg' ])
	})
})

describe('substitutionBodies', () => {
	test('finds $() and backtick bodies', () => {
		expect(substitutionBodies('a $(b c) `d` $(e $(f))')).toEqual([ 'b c', 'd', 'e $(f)' ])
	})

	test('takes the rest of an unclosed substitution', () => {
		expect(substitutionBodies('echo $(git push')).toEqual([ 'git push' ])
	})
})

describe('extractCommands', () => {
	test('walks if and while bodies', () => {
		const commands = extractCommands({
			type: 'Script',
			commands: [
				{
					type: 'If',
					clause: { type: 'CompoundList', commands: [ { type: 'Command', name: { text: 'test' }, suffix: [ { type: 'Word', text: '-f' }, { type: 'Word', text: 'x' } ] } ] },
					then: { type: 'CompoundList', commands: [ { type: 'Command', name: { text: 'rm' }, suffix: [ { type: 'Word', text: 'x' } ] } ] }
				},
				{
					type: 'While',
					clause: { type: 'CompoundList', commands: [ { type: 'Command', name: { text: 'true' } } ] },
					do: { type: 'CompoundList', commands: [ { type: 'Command', name: { text: 'sleep' }, suffix: [ { type: 'Word', text: '1' } ] } ] }
				}
			]
		})
		expect(commands.map(c => c.cmd)).toEqual([ 'test', 'rm', 'true', 'sleep' ])
	})

	test('keeps prefix-only commands as assignments', () => {
		const [ info ] = extractCommands({
			type: 'Command',
			prefix: [ { type: 'AssignmentWord', text: 'SKIP=1' } ]
		})
		expect(info.cmd).toBe('')
		expect(info.assignments).toEqual([ 'SKIP=1' ])
	})

	test('ignores unknown nodes', () => {
		expect(extractCommands({ type: 'Comment' })).toEqual([])
		expect(extractCommands(undefined)).toEqual([])
	})
})

describe('tokenizeCommands', () => {
	test('honours quotes and separators', () => {
		const commands = tokenizeCommands('echo "a b" \'c;d\' > out.txt; rm -f x')
		expect(commands).toHaveLength(2)
		expect(commands[0].cmd).toBe('echo')
		expect(commands[0].args).toEqual([ 'a b', 'c;d' ])
		expect(commands[0].redirects).toEqual([ 'out.txt' ])
		expect(commands[1].cmd).toBe('rm')
		expect(commands[1].flags).toEqual([ 'f' ])
		expect(commands[1].args).toEqual([ 'x' ])
	})

	test('splits on && and ||', () => {
		expect(tokenizeCommands('a && b || c').map(c => c.cmd)).toEqual([ 'a', 'b', 'c' ])
	})

	test('reads leading assignments', () => {
		const [ info ] = tokenizeCommands('FOO=1 BAR=2 make test')
		expect(info.assignments).toEqual([ 'FOO=1', 'BAR=2' ])
		expect(info.cmd).toBe('make')
		expect(info.args).toEqual([ 'test' ])
	})

	test('recognises attached and clobbering redirects', () => {
		expect(tokenizeCommands('cmd 2>err.log')[0].redirects).toEqual([ 'err.log' ])
		expect(tokenizeCommands('echo hi >| forced.txt')[0].redirects).toEqual([ 'forced.txt' ])
		expect(tokenizeCommands('ls &> all.log')[0].redirects).toEqual([ 'all.log' ])
	})

	test('unescapes backslashes', () => {
		expect(tokenizeCommands('rm my\\ file')[0].args).toEqual([ 'my file' ])
	})

	test('finds git subcommands', () => {
		const [ info ] = tokenizeCommands('git push --force origin main')
		expect(info.subcommand).toBe('push')
		expect(info.subArgs).toEqual([ 'origin', 'main' ])
	})
})

describe('writeTargets', () => {
	test('redirects are writes', () => {
		expect(targetsOf('echo hi > out.txt')).toEqual([ 'write:out.txt' ])
	})

	test('mv deletes its sources and writes its destination', () => {
		expect(targetsOf('mv a.txt b.txt dest')).toEqual([ 'delete:a.txt', 'delete:b.txt', 'write:dest' ])
	})

	test('cp writes its last argument', () => {
		expect(targetsOf('cp -r src.txt dst.txt')).toEqual([ 'write:dst.txt' ])
	})

	test('rm deletes every argument', () => {
		expect(targetsOf('rm -f one two')).toEqual([ 'delete:one', 'delete:two' ])
	})

	test('touch and tee write every argument', () => {
		expect(targetsOf('touch x y')).toEqual([ 'write:x', 'write:y' ])
		expect(targetsOf('ls | tee -a listing.txt')).toEqual([ 'write:listing.txt' ])
	})

	test('sed writes only in place', () => {
		expect(targetsOf('sed -i s/a/b/ f.txt')).toEqual([ 'write:f.txt' ])
		expect(targetsOf('sed s/a/b/ f.txt')).toEqual([])
	})

	test('read-only commands write nothing', () => {
		expect(targetsOf('ls -la')).toEqual([])
		expect(targetsOf('cat a.txt b.txt')).toEqual([])
	})
})
