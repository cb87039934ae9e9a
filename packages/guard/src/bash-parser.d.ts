declare module 'bash-parser' {
	interface ParseOptions {
		mode?: 'posix' | 'bash';
		insertLOC?: boolean;
	}

	export default function parse(source: string, options?: ParseOptions): unknown
}
