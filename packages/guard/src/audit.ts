/**
 * Append-only audit log (JSON Lines)
 *
 * Each line is one self-contained record carrying a sha256 checksum of its own
 * serialisation. Appends hold a lock file beside the log, so records from
 * concurrent hook processes never interleave; a fragment left by a killed
 * writer is fenced off with a newline before the next record goes in.
 */

import {
	createLogger,
	describeError,
	findLogFiles,
	isErrnoException,
	type LockOptions,
	LogWriteFailure,
	withFileLock
} from '@hookwarden/core'
import { createHash } from 'crypto'
import {
	closeSync,
	existsSync,
	fstatSync,
	fsyncSync,
	mkdirSync,
	openSync,
	readFileSync,
	readSync,
	writeSync
} from 'fs'
import { dirname } from 'path'
import { v4 as uuidv4 } from 'uuid'
import { z } from 'zod'

import type { HookEvent, Verdict } from './types.js'

const logger = createLogger('audit')

export const AUDIT_VERSION = 1
export const MAX_COMMAND_LENGTH = 2000

const auditRecordSchema = z.object({
	v: z.literal(AUDIT_VERSION),
	id: z.string().min(1),
	ts: z.string().min(1),
	event: z.object({
		tool: z.string(),
		command: z.string().optional(),
		commandTruncated: z.boolean().optional(),
		filePath: z.string().optional(),
		cwd: z.string(),
		contentBytes: z.number().int().nonnegative().optional(),
		contentSha256: z.string().optional()
	}),
	verdict: z.object({
		state: z.enum([ 'ALLOW', 'ALLOW_OVERRIDDEN', 'BLOCK' ]),
		blocked: z.boolean(),
		overridden: z.boolean(),
		reasons: z.array(z.string()),
		blockedBy: z.array(z.string()),
		warnings: z.array(z.string())
	}),
	override: z.object({
		presented: z.boolean(),
		used: z.boolean().optional()
	}),
	checksum: z.string().regex(/^[0-9a-f]{64}$/)
})

export type AuditRecord = z.infer<typeof auditRecordSchema>
export type UnsignedAuditRecord = Omit<AuditRecord, 'checksum'>

export interface CorruptLine {
	file: string;
	/** 1-based */
	line: number;
	error: string;
}

export interface AuditReadResult {
	records: AuditRecord[];
	corrupt: CorruptLine[];
}

export interface AuditStats {
	files: number;
	total: number;
	allowed: number;
	blocked: number;
	overridden: number;
	warned: number;
	corrupt: number;
	/** Blocks (including overridden ones) per guard */
	byGuard: Record<string, number>;
	byTool: Record<string, number>;
	first?: string;
	last?: string;
}

export function sha256(text: string): string {
	return createHash('sha256').update(text).digest('hex')
}

export function checksumOf(record: UnsignedAuditRecord): string {
	return sha256(JSON.stringify(record))
}

/**
 * Audit record for one evaluated event. File content is summarised by size
 * and digest, never stored.
 */
export function buildAuditRecord(
	event: HookEvent,
	verdict: Verdict,
	override: { presented: boolean },
	now: Date = new Date()
): AuditRecord {
	const truncated = event.command !== undefined && event.command.length > MAX_COMMAND_LENGTH

	// Key order follows auditRecordSchema: readers re-serialise the parsed record to check it
	const unsigned: UnsignedAuditRecord = {
		v: AUDIT_VERSION,
		id: uuidv4(),
		ts: now.toISOString(),
		event: {
			tool: event.toolName,
			command: truncated ? event.command?.slice(0, MAX_COMMAND_LENGTH) : event.command,
			commandTruncated: truncated || undefined,
			filePath: event.filePath,
			cwd: event.workingDirectory,
			contentBytes: event.newContent === undefined ? undefined : Buffer.byteLength(event.newContent),
			contentSha256: event.newContent === undefined ? undefined : sha256(event.newContent)
		},
		verdict: {
			state: verdict.state,
			blocked: verdict.blocked,
			overridden: verdict.overridden,
			reasons: verdict.reasons,
			blockedBy: verdict.blockedBy,
			warnings: verdict.warnings
		},
		override: {
			presented: override.presented,
			used: override.presented ? verdict.overridden : undefined
		}
	}

	return { ...unsigned, checksum: checksumOf(unsigned) }
}

/**
 * Parse and check one line. Returns the record or the reason it is corrupt.
 */
export function parseAuditLine(line: string): AuditRecord | string {
	let json: unknown
	try {
		json = JSON.parse(line)
	} catch (error) {
		return `not JSON: ${ describeError(error) }`
	}

	const parsed = auditRecordSchema.safeParse(json)
	if (!parsed.success) {
		const issue = parsed.error.issues[0]
		return `invalid record at ${ issue.path.join('.') || 'root' }: ${ issue.message }`
	}

	const { checksum, ...unsigned } = parsed.data
	if (checksumOf(unsigned) !== checksum) {
		return 'checksum mismatch'
	}
	return parsed.data
}

export type AuditLogOptions = LockOptions

export class AuditLog {
	readonly lockPath: string

	constructor(readonly path: string, private readonly options: AuditLogOptions = {}) {
		this.lockPath = `${ path }.lock`
	}

	/**
	 * Append one record under the log's lock
	 */
	async append(record: AuditRecord): Promise<void> {
		const line = `${ JSON.stringify(record) }\n`
		try {
			await withFileLock(this.lockPath, () => this.write(line), this.options)
		} catch (error) {
			throw new LogWriteFailure(`could not append to ${ this.path }: ${ describeError(error) }`, { cause: error })
		}
	}

	private write(line: string): void {
		mkdirSync(dirname(this.path), { recursive: true })

		const fd = openSync(this.path, 'a+')
		try {
			const { size } = fstatSync(fd)
			let text = line
			if (size > 0) {
				const last = Buffer.alloc(1)
				readSync(fd, last, 0, 1, size - 1)
				if (last[0] !== 0x0a) {
					logger.warn({ path: this.path }, 'repairing torn audit line')
					text = `\n${ line }`
				}
			}
			writeSync(fd, text)
			fsyncSync(fd)
		} finally {
			closeSync(fd)
		}
	}

	/**
	 * Read one log file. A missing file reads as empty.
	 */
	readFile(file: string = this.path): AuditReadResult {
		let content: string
		try {
			content = readFileSync(file, 'utf-8')
		} catch (error) {
			if (isErrnoException(error) && error.code === 'ENOENT') {
				return { records: [], corrupt: [] }
			}
			throw error
		}

		const records: AuditRecord[] = []
		const corrupt: CorruptLine[] = []

		content.split('\n').forEach((line, index) => {
			if (!line.trim()) {return}
			const result = parseAuditLine(line)
			if (typeof result === 'string') {
				corrupt.push({ file, line: index + 1, error: result })
			} else {
				records.push(result)
			}
		})

		return { records, corrupt }
	}

	/**
	 * Every rotated file and then the live log, oldest first
	 */
	async files(): Promise<string[]> {
		if (!existsSync(dirname(this.path))) {return []}
		return findLogFiles(this.path)
	}

	async read(): Promise<AuditReadResult> {
		const result: AuditReadResult = { records: [], corrupt: [] }
		for (const file of await this.files()) {
			const { records, corrupt } = this.readFile(file)
			result.records.push(...records)
			result.corrupt.push(...corrupt)
		}
		return result
	}

	async verify(): Promise<{ valid: boolean; files: number; records: number; corrupt: CorruptLine[] }> {
		const files = await this.files()
		const { records, corrupt } = await this.read()
		return { valid: corrupt.length === 0, files: files.length, records: records.length, corrupt }
	}

	async stats(): Promise<AuditStats> {
		const files = await this.files()
		const { records, corrupt } = await this.read()
		return summarize(records, files.length, corrupt.length)
	}
}

export function summarize(records: AuditRecord[], files: number = 1, corrupt: number = 0): AuditStats {
	const stats: AuditStats = {
		files,
		total: records.length,
		allowed: 0,
		blocked: 0,
		overridden: 0,
		warned: 0,
		corrupt,
		byGuard: {},
		byTool: {}
	}

	for (const record of records) {
		const { verdict, event, ts } = record
		if (verdict.state === 'ALLOW') {stats.allowed++}
		if (verdict.state === 'BLOCK') {stats.blocked++}
		if (verdict.state === 'ALLOW_OVERRIDDEN') {stats.overridden++}
		if (verdict.warnings.length > 0) {stats.warned++}

		for (const guard of verdict.blockedBy) {
			stats.byGuard[guard] = (stats.byGuard[guard] ?? 0) + 1
		}
		stats.byTool[event.tool] = (stats.byTool[event.tool] ?? 0) + 1

		if (!stats.first || ts < stats.first) {stats.first = ts}
		if (!stats.last || ts > stats.last) {stats.last = ts}
	}

	return stats
}
