// CHANGE: Predicate-based partition of the test phase into serial / non-serial sets
// WHY: The filter strings handed to the test runner and the predicate come from one marker
// FORMAT THEOREM: ∀ids: serial ∪ nonSerial = ids ∧ serial ∩ nonSerial = ∅
// PURITY: CORE
// INVARIANT: isSerial(id) ↔ filterFor("serial") selects id in the external runner, for markers matching SERIAL_MARKER_PATTERN
// COMPLEXITY: O(n·m) where n = |ids|, m = |marker|

export type TestPhase = "serial" | "non-serial";

export interface PartitionPolicy {
	readonly marker: string;
	readonly isSerial: (testId: string) => boolean;
	readonly filterFor: (phase: TestPhase) => string;
}

export interface TestPartition {
	readonly serial: ReadonlyArray<string>;
	readonly nonSerial: ReadonlyArray<string>;
}

export const DEFAULT_SERIAL_MARKER = "serial_db";

/**
 * Markers the filter language reads as a plain substring. A leading `=`, `/`
 * or `#` switches `test(...)` to exact, regex or glob matching, and `(`, `)`
 * or `,` break the expression.
 */
export const SERIAL_MARKER_PATTERN = /^[A-Za-z0-9_:]+$/u;

/** @pure true */
export const isValidSerialMarker = (marker: string): boolean =>
	SERIAL_MARKER_PATTERN.test(marker);

/**
 * Builds the partition policy for a serial marker.
 *
 * `test(<marker>)` in the test runner's filter language is a substring match
 * on the test identifier, so the predicate is too.
 *
 * @pure true
 * @precondition isValidSerialMarker(marker)
 *
 * @example
 * ```ts
 * const policy = makePartitionPolicy("serial_db");
 * policy.isSerial("storage::tests::insert_serial_db"); // true
 * policy.filterFor("non-serial"); // "not test(serial_db)"
 * ```
 */
export const makePartitionPolicy = (marker: string): PartitionPolicy => ({
	marker,
	isSerial: (testId) => testId.includes(marker),
	filterFor: (phase) =>
		phase === "serial" ? `test(${marker})` : `not test(${marker})`,
});

/**
 * Splits test identifiers into the two execution phases, preserving input order.
 *
 * @pure true
 * @postcondition |serial| + |nonSerial| = |ids|
 */
export const partitionTests = (
	ids: ReadonlyArray<string>,
	policy: PartitionPolicy,
): TestPartition => {
	const serial: string[] = [];
	const nonSerial: string[] = [];
	for (const id of ids) {
		if (policy.isSerial(id)) {
			serial.push(id);
		} else {
			nonSerial.push(id);
		}
	}
	return { serial, nonSerial };
};
