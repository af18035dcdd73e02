/**
 * Mutable read position over accumulating input.
 *
 * Combinators only ever take a snapshot and put it back. Taking a snapshot
 * must be cheap since every nested `group()` takes one. Reading and advancing
 * are left to the implementation and to the rules written against it.
 */
export interface Cursor<S = unknown> {
	snapshot(): S;

	/**
	 * Puts the cursor back into the state it had when `snapshot` was taken.
	 */
	restore(snapshot: S): void;
}
