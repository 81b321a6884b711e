import { describeState, type FSMState } from "./state.ts";

/**
 * Kinds of failures the engine reports.
 *
 * - `NullTarget` - an operation received a `null`/`undefined` state
 * - `DuplicateState` - registering a state that is already registered
 * - `StateNotFound` - the state (or the recorded history state) is not registered
 * - `NoHistory` - nothing recorded to return to
 * - `TransitionDepthExceeded` - too many transitions nested inside enter/exit hooks
 */
export type FSMErrorKind =
	| "NullTarget"
	| "DuplicateState"
	| "StateNotFound"
	| "NoHistory"
	| "TransitionDepthExceeded";

/** Engine method names, as reported in `FSMError.operation`. */
export type FSMOperation =
	| "addState"
	| "deleteState"
	| "goToState"
	| "goToPreviousState"
	| "pushState"
	| "popState";

/**
 * A reported engine failure.
 *
 * The engine never throws these. They are logged through the engine's logger
 * and published to `onError` subscribers, and the failing operation returns `false`.
 */
export class FSMError<TState extends FSMState = FSMState> extends Error {
	name = "FSMError";

	constructor(
		public readonly kind: FSMErrorKind,
		public readonly operation: FSMOperation,
		message: string,
		public readonly state: TState | null = null
	) {
		super(message);
	}

	static nullTarget<T extends FSMState>(operation: FSMOperation): FSMError<T> {
		return new FSMError<T>(
			"NullTarget",
			operation,
			`${operation}: null state reference is not allowed`
		);
	}

	static duplicate<T extends FSMState>(state: T): FSMError<T> {
		return new FSMError(
			"DuplicateState",
			"addState",
			`addState: unable to add "${describeState(state)}" because it has already been added`,
			state
		);
	}

	static notFound<T extends FSMState>(
		operation: FSMOperation,
		state: T
	): FSMError<T> {
		return new FSMError(
			"StateNotFound",
			operation,
			`${operation}: "${describeState(state)}" is not registered`,
			state
		);
	}

	static noHistory<T extends FSMState>(operation: FSMOperation): FSMError<T> {
		const what = operation === "popState" ? "no state has been pushed" : "no previous state recorded";
		return new FSMError<T>("NoHistory", operation, `${operation}: ${what}`);
	}

	static depthExceeded<T extends FSMState>(
		operation: FSMOperation,
		state: T,
		limit: number
	): FSMError<T> {
		return new FSMError(
			"TransitionDepthExceeded",
			operation,
			`${operation}: "${describeState(state)}" refused, transition depth limit (${limit}) reached`,
			state
		);
	}
}
