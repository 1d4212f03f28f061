/**
 * Value store and conditional runner for scopeline
 */

import { format } from "node:util";

/**
 * Optional sign, then a base prefix (0x, 0o, 0b, or a bare leading 0 for
 * octal) or plain decimal digits. `_` may only sit between digits or right
 * after a prefix.
 */
const INTEGER_PATTERN =
	/^[+-]?(?:0[xX](?:_?[0-9a-fA-F])+|0[oO](?:_?[0-7])+|0[bB](?:_?[01])+|0(?:_?[0-7])+|[1-9](?:_?[0-9])*|0)$/;

/**
 * Parse integer text with its base taken from the prefix.
 * Returns undefined for malformed text or values beyond the safe integer range.
 */
export function parseInteger(text: string): number | undefined {
	if (!INTEGER_PATTERN.test(text)) {
		return undefined;
	}

	const negative = text.startsWith("-");
	let digits = text.replace(/^[+-]/, "").replaceAll("_", "");
	// BigInt reads 0x/0o/0b itself; a bare leading zero means octal
	if (/^0[0-7]/.test(digits)) {
		digits = `0o${digits.slice(1)}`;
	}

	const magnitude = BigInt(digits);
	const value = negative ? -magnitude : magnitude;
	if (
		value > BigInt(Number.MAX_SAFE_INTEGER) ||
		value < BigInt(Number.MIN_SAFE_INTEGER)
	) {
		return undefined;
	}
	return Number(value);
}

/**
 * An associative store with typed accessors, shared by every scope derived
 * from a common root. Last write wins.
 *
 * @example
 * ```typescript
 * const values = new ValueStore()
 * values.set("port", "8080")
 * values.getInt("port") // 8080
 * values.getString("missing") // ""
 * ```
 */
export class ValueStore {
	private readonly entries = new Map<unknown, unknown>();

	constructor(initial?: Iterable<readonly [unknown, unknown]>) {
		if (initial) {
			for (const [key, value] of initial) {
				this.entries.set(key, value);
			}
		}
	}

	set(key: unknown, value: unknown): void {
		this.entries.set(key, value);
	}

	/**
	 * Returns the value and whether the key was present, so a stored
	 * `undefined` can be told apart from a missing key.
	 */
	getExists(key: unknown): [value: unknown, found: boolean] {
		if (!this.entries.has(key)) {
			return [undefined, false];
		}
		return [this.entries.get(key), true];
	}

	get(key: unknown): unknown {
		return this.entries.get(key);
	}

	has(key: unknown): boolean {
		return this.entries.has(key);
	}

	delete(key: unknown): boolean {
		return this.entries.delete(key);
	}

	get size(): number {
		return this.entries.size;
	}

	/**
	 * Textual view of a value. Strings come back unchanged, errors as their
	 * message, anything else in its default rendering. Missing keys give "".
	 */
	getString(key: unknown): string {
		const [value, found] = this.getExists(key);
		if (!found) return "";
		if (typeof value === "string") return value;
		if (value instanceof Error) return value.message;
		if (typeof value === "bigint") return value.toString();
		return format("%s", value);
	}

	/**
	 * Integer view of a value. Safe integers and bigints in range are
	 * returned directly, strings are parsed with {@link parseInteger}.
	 * Everything else, including missing keys, gives 0.
	 */
	getInt(key: unknown): number {
		const value = this.entries.get(key);
		switch (typeof value) {
			case "number":
				return Number.isSafeInteger(value) ? value : 0;
			case "bigint":
				return value <= BigInt(Number.MAX_SAFE_INTEGER) &&
					value >= BigInt(Number.MIN_SAFE_INTEGER)
					? Number(value)
					: 0;
			case "string":
				return parseInteger(value) ?? 0;
			default:
				return 0;
		}
	}
}

/**
 * Key of a boolean flag. Keys are interned by name, so
 * `FlagKey.for("x") === FlagKey.for("x")`, and never equal a plain string key.
 */
export class FlagKey {
	private static readonly registry = new Map<string, FlagKey>();

	private constructor(readonly name: string) {}

	static for(name: string): FlagKey {
		let key = FlagKey.registry.get(name);
		if (!key) {
			key = new FlagKey(name);
			FlagKey.registry.set(name, key);
		}
		return key;
	}

	toString(): string {
		return `FlagKey(${this.name})`;
	}
}

/**
 * Stores boolean flags in a value store and runs callbacks behind them.
 */
export class ConditionalRunner {
	constructor(private readonly store: ValueStore) {}

	setFlag(key: FlagKey, value: boolean): void {
		this.store.set(key, value);
	}

	/**
	 * Runs `fn` only when the flag is present and exactly `true`.
	 * @returns whether `fn` ran
	 */
	runIf(key: FlagKey, fn: () => void): boolean {
		const [value, found] = this.store.getExists(key);
		if (found && value === true) {
			fn();
			return true;
		}
		return false;
	}
}
