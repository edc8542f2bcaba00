/**
 * deltalog - semantic analysis for Datalog programs with delta update rules
 *
 * Builds the tables a relational code generator needs from a parsed program:
 * symbol tables, column names, per-rule variable occurrences and equalities,
 * and the set of update predicates.
 */

// Common data types and errors
export { StatusCode } from './common/types.js';
export {
	DeltalogError, LexError, SyntaxError, SemanticError, MisuseError,
	lexError, syntaxError, formatSourceError, unwrapError, formatErrorChain,
} from './common/errors.js';
export type { ErrorInfo } from './common/errors.js';
export { createLogger, enableLogging, disableLogging, isLoggingEnabled } from './common/logger.js';

// AST
export type * from './parser/ast.js';
export { isDeltaAtom, atomArity } from './parser/ast.js';
export {
	constantToString, variableToString, atomToString, literalToString,
	statementToString, programToString,
} from './emit/ast-stringify.js';

// Keys and ordered sets
export {
	symtKey, keyOfAtom, keyOfRule, compareKeys, keysEqual, formatKey, aliasOfKey,
	removeRepeatedKeys, compareVariables, compareAtoms,
} from './analysis/key.js';
export type { SymtKey } from './analysis/key.js';
export { OrderedSet, createKeySet, createVariableSet, createAtomSet } from './analysis/ordered-set.js';
export type { KeySet, VariableSet, AtomSet } from './analysis/ordered-set.js';

// Configuration
export { DEFAULT_ANALYSIS_OPTIONS, resolveAnalysisOptions } from './analysis/options.js';
export type { AnalysisOptions } from './analysis/options.js';

// Tables
export { SymbolTable, extractIntensional, extractExtensional, symbolTableToString } from './analysis/symbol-table.js';
export type { SymbolEntry } from './analysis/symbol-table.js';
export { ColumnNameTable, buildColumnNameTable } from './analysis/column-table.js';
export {
	VariableTable, buildVariableTable, joinConditions, formatColumnReference, occurrenceAlias,
} from './analysis/variable-table.js';
export type { ColumnReference, JoinCondition } from './analysis/variable-table.js';
export { EqualityTable, buildEqualityTable } from './analysis/equality-table.js';

// Program-level extraction
export { extractDeltaPredicates } from './analysis/delta.js';
export { getQuery } from './analysis/query.js';
export { canonicalizeAtom, toTempAtom, deltaToPlain, literalVariables, literalsVariableSet } from './analysis/transform.js';
export { analyzeProgram, analyzeRule } from './analysis/analyze.js';
export type { ProgramAnalysis, RuleAnalysis } from './analysis/analyze.js';
