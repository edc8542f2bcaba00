/**
 * Standard status/error codes, numbered after the SQLite result codes the
 * downstream SQL emitter speaks.
 */
export enum StatusCode {
	OK = 0,
	ERROR = 1,
	NOTFOUND = 12,
	MISUSE = 21,
}
