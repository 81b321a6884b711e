/**
 * Arbitrary payload data passed during transitions.
 * This can be any value and is forwarded to the entering state's `onEnter` hook.
 */
export type FSMPayload = unknown;

/**
 * A unit of behavior hosted by the engine.
 *
 * States are compared by identity, never by value, so two instances with
 * identical content are still distinct registrations. All hooks are optional
 * and are invoked by the engine only, never directly by the host loop.
 *
 * A state that needs to request transitions should receive the engine
 * explicitly (e.g. as a constructor argument).
 *
 * @template TPayload - Type of the payload accepted by `onEnter`
 *
 * @example
 * ```typescript
 * class Falling implements FSMState {
 *   readonly name = "falling";
 *   constructor(private fsm: FSMEngine, private player: Player) {}
 *   reason() {
 *     if (this.player.grounded) this.fsm.goToState(this.player.idle);
 *   }
 * }
 * ```
 */
export interface FSMState<TPayload = FSMPayload> {
	/** Used in log and error messages. Falls back to the constructor name. */
	readonly name?: string;

	/**
	 * Called once when the state becomes current via a direct transition or a push.
	 * `payload` is `undefined` unless the transition carried one.
	 */
	onEnter?(payload?: TPayload): void;

	/**
	 * Called once when the state stops being current via a direct transition,
	 * or when it is popped. Not called when suspended by a push.
	 */
	onExit?(): void;

	/** Main update phase. */
	onUpdate?(): void;

	/** Fixed-timestep phase. */
	onFixedUpdate?(): void;

	/** Late update phase. */
	onLateUpdate?(): void;

	/**
	 * Runs right after `onLateUpdate`, every frame.
	 * The canonical place to check transition conditions.
	 */
	reason?(): void;

	onRender?(): void;

	onPostRender?(): void;
}

/** Returns the display name of a state for log messages. */
export function describeState(state: FSMState): string {
	if (typeof state.name === "string" && state.name !== "") return state.name;
	return state.constructor.name;
}
