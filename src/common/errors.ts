import { StatusCode } from './types.js';
import type { SourcePosition, SourceSpan } from '../parser/ast.js';
import type { SymtKey } from '../analysis/key.js';

/**
 * Renders a message against a source span in the form the driver reports:
 * `File "<name>", line <n>, characters <start>-<end>: '<message>'`.
 * Character offsets are relative to the beginning of their own line.
 */
export function formatSourceError(message: string, start: SourcePosition, end: SourcePosition): string {
	return `File "${start.fileName}", line ${start.line}, characters ${start.offset - start.lineStart}-${end.offset - end.lineStart}: '${message}'`;
}

/**
 * Base class for deltalog errors
 * Provides source location and status code support
 */
export class DeltalogError extends Error {
	public code: number;
	public span?: SourceSpan;

	constructor(message: string, code: number = StatusCode.ERROR, cause?: Error, span?: SourceSpan) {
		super(message, cause ? { cause } : undefined);
		this.code = code;
		this.name = 'DeltalogError';
		this.span = span;

		if (span) {
			this.message = formatSourceError(message, span.start, span.end);
		}

		// Maintain stack trace in V8
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, DeltalogError);
		}
	}
}

/**
 * Raised by the lexer for a token it does not recognize.
 */
export class LexError extends DeltalogError {
	constructor(public readonly lexeme: string, span: SourceSpan) {
		super(lexeme, StatusCode.ERROR, undefined, span);
		this.name = 'LexError';
		Object.setPrototypeOf(this, LexError.prototype);
	}
}

/**
 * Raised by the parser when a non-terminal fails to match.
 */
export class SyntaxError extends DeltalogError {
	constructor(message: string = 'Syntax error', span?: SourceSpan) {
		super(message, StatusCode.ERROR, undefined, span);
		this.name = 'SyntaxError';
		Object.setPrototypeOf(this, SyntaxError.prototype);
	}
}

/**
 * Meaning-level violation found while building the analysis tables
 * (missing or ambiguous query, no update rule, misplaced aggregate).
 */
export class SemanticError extends DeltalogError {
	constructor(message: string, public readonly key?: SymtKey, span?: SourceSpan) {
		super(message, StatusCode.ERROR, undefined, span);
		this.name = 'SemanticError';
		Object.setPrototypeOf(this, SemanticError.prototype);
	}
}

/**
 * Error thrown when a caller breaks a precondition of the API
 * (e.g. a non-rule statement handed to the symbol table).
 */
export class MisuseError extends DeltalogError {
	constructor(message: string = 'API misuse', code: number = StatusCode.MISUSE) {
		super(message, code);
		this.name = 'MisuseError';
		Object.setPrototypeOf(this, MisuseError.prototype);
	}
}

/** Throws a LexError for the offending lexeme. */
export function lexError(lexeme: string, span: SourceSpan): never {
	throw new LexError(lexeme, span);
}

/** Throws a SyntaxError covering the span of the failing non-terminal. */
export function syntaxError(message: string, span: SourceSpan): never {
	throw new SyntaxError(message, span);
}

export interface ErrorInfo {
	name: string;
	message: string;
	code?: number;
	stack?: string;
}

/**
 * Flattens an error and its `cause` chain, outermost first.
 */
export function unwrapError(error: unknown): ErrorInfo[] {
	const chain: ErrorInfo[] = [];
	const seen = new Set<unknown>();
	let current: unknown = error;

	while (current !== undefined && current !== null && !seen.has(current)) {
		seen.add(current);
		if (current instanceof Error) {
			chain.push({
				name: current.name,
				message: current.message,
				code: current instanceof DeltalogError ? current.code : undefined,
				stack: current.stack,
			});
			current = current.cause;
		} else {
			chain.push({ name: 'Error', message: String(current) });
			break;
		}
	}

	return chain;
}

/** Formats an unwrapped error chain, one line per error. */
export function formatErrorChain(chain: readonly ErrorInfo[], includeStack = false): string {
	return chain.map((info, i) => {
		const prefix = i === 0 ? 'Error' : 'Caused by';
		const line = `${prefix}: ${info.message}`;
		return includeStack && info.stack ? `${line}\n${info.stack}` : line;
	}).join('\n');
}
