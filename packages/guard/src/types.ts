/**
 * Type definitions for the guard engine
 */

import type { PatternSet } from './patterns.js'

/** Tools the host reports; any other name is passed through as a string */
export type ToolName = 'Bash' | 'Write' | 'Edit' | 'MultiEdit' | 'NotebookEdit' | (string & {})

/** Tools that write file content */
export const FILE_TOOLS = [ 'Write', 'Edit', 'MultiEdit', 'NotebookEdit' ] as const

/** Normalized description of one proposed action */
export interface HookEvent {
	readonly toolName: ToolName;
	readonly command?: string;
	readonly filePath?: string;
	readonly newContent?: string;
	readonly workingDirectory: string;
	/** ISO-8601 */
	readonly timestamp: string;
}

export type Severity = 'info' | 'warn' | 'block'

/** One guard's opinion about one event */
export interface Decision {
	guardName: string;
	blocked: boolean;
	severity: Severity;
	reason: string;
	suggestion?: string;
}

/** A single safety check */
export interface Guard {
	readonly name: string;
	readonly description: string;
	/** Tool names this guard inspects, or '*' for all */
	readonly tools: readonly ToolName[] | '*';
	/** Detection patterns, for listing; path and flag checks live in `check` */
	readonly patterns: PatternSet;
	check(event: HookEvent): Decision;
}

export type VerdictState = 'ALLOW' | 'ALLOW_OVERRIDDEN' | 'BLOCK'

/** Final decision for one event */
export interface Verdict {
	state: VerdictState;
	blocked: boolean;
	overridden: boolean;
	/** `<guard>: <reason>` for every blocking decision, in registry order */
	reasons: string[];
	blockedBy: string[];
	/** `<guard>: <reason>` for non-blocking warn decisions */
	warnings: string[];
	decisions: Decision[];
}

/** Parsed command info extracted from a shell command line */
export interface CommandInfo {
	cmd: string;
	args: string[];
	flags: string[];
	paths: string[];
	raw: string[];
	/** Files written through `>`, `>>` or `>|` */
	redirects: string[];
	/** `NAME=value` prefixes */
	assignments: string[];
	subcommand?: string;
	subArgs?: string[];
}

/** A command name or redirect target word */
export interface WordNode {
	text: string;
	expansion?: ASTNode[];
}

/** bash-parser AST node (the subset the engine reads) */
export interface ASTNode {
	type: string;
	text?: string;
	/** Parameter, arithmetic and command expansions inside a word */
	expansion?: ASTNode[];
	/** Source and parsed body of a `$(...)` or backtick substitution */
	command?: string;
	commandAST?: ASTNode;
	commands?: ASTNode[];
	left?: ASTNode;
	right?: ASTNode;
	list?: ASTNode;
	clause?: ASTNode;
	do?: ASTNode;
	then?: ASTNode;
	else?: ASTNode;
	name?: WordNode;
	prefix?: ASTNode[];
	suffix?: ASTNode[];
	/** `{ text }` on redirects, a bare string ('and' / 'or') on logical expressions */
	op?: { text: string } | string;
	file?: WordNode;
	body?: ASTNode;
}

/** Settings every guard and store is built from */
export interface GuardConfig {
	/** Project root; defaults to the enclosing git root or the hook's cwd */
	projectRoot?: string;
	/** Extra directories `cd` may enter */
	allowedPaths: string[];
	/** The one installation script that may be created or edited */
	installEntryPoint: string;
	/** Globs (gitignore syntax) of protected test/verification files */
	protectedFiles: string[];
	/** Guards switched off by the operator */
	disabledGuards: string[];
	/** SQLite file for override codes */
	overrideStore: string;
	/** JSON Lines audit log */
	auditLog: string;
	overrideTtlMinutes: number;
	lockTimeoutMs: number;
	staleLockMs: number;
}
