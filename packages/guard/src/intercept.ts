/**
 * Interception adapter: host payload in, exit code and stderr report out
 *
 *   0  allow (including allowed by override)
 *   2  block
 *   1  the check itself failed (bad payload, engine could not start)
 */

import {
	createLogger,
	describeError,
	EXIT,
	type ExitCode,
	InputError,
	parseHookInput,
	type PreToolInput
} from '@hookwarden/core'

import { aggregate } from './aggregator.js'
import { type AuditLog, type AuditRecord, buildAuditRecord } from './audit.js'
import type { OverrideValidator } from './override.js'
import type { GuardRegistry } from './registry.js'
import { type Decision, FILE_TOOLS, type HookEvent, type ToolName, type Verdict } from './types.js'

const logger = createLogger('intercept')

export interface ParseOptions {
	cwd?: string;
	now?: () => Date;
}

const KNOWN_TOOLS = new Map<string, ToolName>(
	[ 'Bash', ...FILE_TOOLS ].map((name): [string, ToolName] => [ name.toLowerCase(), name ])
)

/**
 * Host tool name in its canonical spelling: `bash`, `BASH` and `Bash` are one
 * tool, as are `multi_edit` and `MultiEdit`. Unknown names pass through.
 */
export function canonicalToolName(name: string): ToolName {
	return KNOWN_TOOLS.get(name.replace(/[_-]/g, '').toLowerCase()) ?? name
}

/**
 * Content the tool is about to write, if any
 */
function newContentOf(toolName: ToolName, toolInput: PreToolInput['tool_input']): string | undefined {
	switch (toolName) {
		case 'Write':
			return toolInput.content
		case 'Edit':
			return toolInput.new_string
		case 'MultiEdit':
			return toolInput.edits?.map(edit => edit.new_string ?? '').join('\n') ?? toolInput.new_string
		case 'NotebookEdit':
			return toolInput.new_source
		default:
			return toolInput.content ?? toolInput.new_string
	}
}

/**
 * Validate a raw hook payload and build the immutable event guards see
 */
export function parseHookEvent(raw: string, options: ParseOptions = {}): HookEvent {
	const input = parseHookInput(raw)
	const toolName = canonicalToolName(input.tool_name)
	const command = input.tool_input.command
	const filePath = input.tool_input.file_path ?? input.tool_input.notebook_path
	const newContent = newContentOf(toolName, input.tool_input)

	if (command === undefined && filePath === undefined && newContent === undefined) {
		throw new InputError(`${ input.tool_name } payload has no command, file_path or content`)
	}

	return Object.freeze({
		toolName,
		command,
		filePath,
		newContent,
		workingDirectory: input.cwd ?? options.cwd ?? process.cwd(),
		timestamp: (options.now?.() ?? new Date()).toISOString()
	})
}

export interface InterceptDeps {
	registry: Pick<GuardRegistry, 'evaluate'>;
	/** Opened only when an event is blocked and a code was presented */
	openOverrides?: () => OverrideValidator;
	audit?: Pick<AuditLog, 'append'>;
	/** Candidate override code from the operator, passed through untouched */
	overrideCode?: string;
	cwd?: string;
	now?: () => Date;
}

export interface InterceptResult {
	exitCode: ExitCode;
	event?: HookEvent;
	verdict?: Verdict;
	/** Lines for stderr */
	report: string[];
}

function consumeOverride(openOverrides: (() => OverrideValidator) | undefined, code: string): boolean {
	if (!openOverrides) {return false}
	try {
		return openOverrides().validateAndConsume(code)
	} catch (error) {
		// Unusable store: the code counts as absent
		logger.error({ err: describeError(error) }, 'could not open override store')
		return false
	}
}

function describeTarget(event: HookEvent): string {
	if (event.command !== undefined) {return `  Command: ${ event.command }`}
	return `  File: ${ event.filePath ?? '(none)' }`
}

function describeDecision(decision: Decision): string[] {
	const lines = [ `  - ${ decision.guardName }: ${ decision.reason }` ]
	if (decision.suggestion) {
		lines.push(`    Suggestion: ${ decision.suggestion }`)
	}
	return lines
}

/**
 * Human-readable verdict for the host's stderr
 */
export function formatReport(event: HookEvent, verdict: Verdict): string[] {
	const lines: string[] = []
	const blocking = verdict.decisions.filter(d => d.blocked)

	if (verdict.state === 'BLOCK') {
		lines.push('BLOCKED by hookwarden')
		lines.push(`  Tool: ${ event.toolName }`)
		lines.push(describeTarget(event))
		lines.push(...blocking.flatMap(describeDecision))
		lines.push('If this action is intended, ask the operator for an override code (HOOK_OVERRIDE_CODE).')
	} else if (verdict.state === 'ALLOW_OVERRIDDEN') {
		lines.push('ALLOWED by override code')
		lines.push(`  Tool: ${ event.toolName }`)
		lines.push(describeTarget(event))
		lines.push(...blocking.flatMap(describeDecision))
	}

	for (const decision of verdict.decisions) {
		if (decision.blocked || decision.severity !== 'warn') {continue}
		lines.push(`WARNING ${ decision.guardName }: ${ decision.reason }`)
		if (decision.suggestion) {
			lines.push(`  Suggestion: ${ decision.suggestion }`)
		}
	}

	return lines
}

/**
 * Append with one retry. Returns why the second attempt failed, or null.
 */
async function appendWithRetry(audit: Pick<AuditLog, 'append'>, record: AuditRecord): Promise<string | null> {
	try {
		await audit.append(record)
		return null
	} catch (error) {
		logger.warn({ err: describeError(error) }, 'audit append failed, retrying')
	}
	try {
		await audit.append(record)
		return null
	} catch (error) {
		logger.error({ err: describeError(error) }, 'audit append failed')
		return describeError(error)
	}
}

/**
 * Evaluate one hook payload end to end
 */
export async function intercept(raw: string, deps: InterceptDeps): Promise<InterceptResult> {
	let event: HookEvent
	try {
		event = parseHookEvent(raw, { cwd: deps.cwd, now: deps.now })
	} catch (error) {
		if (error instanceof InputError) {
			logger.warn({ err: error.message }, 'rejected hook payload')
			return { exitCode: EXIT.ERROR, report: [ `hookwarden: ${ error.message }` ] }
		}
		throw error
	}

	const decisions = deps.registry.evaluate(event)
	const code = deps.overrideCode?.trim()
	const verdict = aggregate(
		decisions,
		code ? () => consumeOverride(deps.openOverrides, code) : undefined
	)

	logger.debug({ tool: event.toolName, state: verdict.state, blockedBy: verdict.blockedBy }, 'verdict')

	const report = formatReport(event, verdict)

	if (deps.audit) {
		const record = buildAuditRecord(event, verdict, { presented: Boolean(code) }, deps.now?.())
		const failure = await appendWithRetry(deps.audit, record)
		if (failure !== null) {
			report.push(`hookwarden: AUDIT LOG WRITE FAILED: ${ failure }`)
		}
	}

	return {
		exitCode: verdict.blocked ? EXIT.BLOCK : EXIT.ALLOW,
		event,
		verdict,
		report
	}
}
