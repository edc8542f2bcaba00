import type * as AST from '../parser/ast.js';
import { MisuseError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import { StatusCode } from '../common/types.js';
import { variableToString } from '../emit/ast-stringify.js';

const log = createLogger('analysis:rule');

/**
 * Per-rule bindings of variables to constants, taken from `X = c` literals.
 * A variable bound more than once keeps every binding; the most recent one is
 * the one `peek` and `extract` see, and extracting it uncovers the previous.
 */
export class EqualityTable {
	private bindings = new Map<string, readonly AST.Constant[]>();

	add(name: string, value: AST.Constant): void {
		const existing = this.bindings.get(name) ?? [];
		this.bindings.set(name, [...existing, value]);
	}

	has(name: string): boolean {
		return this.bindings.has(name);
	}

	/** The most recent binding of `name`, left in place. */
	peek(name: string): AST.Constant | undefined {
		const stack = this.bindings.get(name);
		return stack?.[stack.length - 1];
	}

	/**
	 * Removes and returns the most recent binding of `name`, so each equality
	 * is applied exactly once.
	 * @throws MisuseError when `name` has no binding left
	 */
	extract(name: string): AST.Constant {
		const stack = this.bindings.get(name);
		if (!stack || stack.length === 0) {
			throw new MisuseError(`No equality binding for variable ${name}`, StatusCode.NOTFOUND);
		}
		const value = stack[stack.length - 1];
		if (stack.length === 1) {
			this.bindings.delete(name);
		} else {
			this.bindings.set(name, stack.slice(0, -1));
		}
		return value;
	}

	/** Number of variables with at least one binding. */
	get size(): number {
		return this.bindings.size;
	}

	names(): string[] {
		return Array.from(this.bindings.keys());
	}
}

/**
 * Builds the equality table of a rule.
 * PRECONDITION: every literal is `variable = constant` over a named or
 * numbered variable; aggregate equalities are filtered out by the caller.
 * @throws MisuseError when the precondition does not hold
 */
export function buildEqualityTable(equalities: readonly AST.EqualLiteral[]): EqualityTable {
	const table = new EqualityTable();
	for (const eq of equalities) {
		const variable = eq.variable;
		switch (variable.type) {
			case 'named':
			case 'numbered':
				table.add(variableToString(variable), eq.value);
				break;
			case 'aggregate':
			case 'constant':
			case 'anonymous':
				throw new MisuseError(`Equality table built from an equality not of the form var = const: ${variableToString(variable)}`);
		}
	}
	log('Equality table: %d variables from %d equalities', table.size, equalities.length);
	return table;
}
