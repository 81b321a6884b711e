import { createPubSub, type Unsubscriber } from "@marianmeres/pubsub";
import { FSMError, type FSMOperation } from "./errors.ts";
import { describeState, type FSMPayload, type FSMState } from "./state.ts";

/**
 * Logger interface compatible with console.
 * All methods accept variadic arguments and return a string.
 */
export interface Logger {
	debug: (...args: unknown[]) => string;
	log: (...args: unknown[]) => string;
	warn: (...args: unknown[]) => string;
	error: (...args: unknown[]) => string;
}

/**
 * Default console-based logger that wraps console methods.
 * Returns the first argument as a string (or empty string if no args).
 */
const defaultLogger: Logger = {
	debug: (...args: unknown[]) => {
		console.debug(...args);
		return String(args[0] ?? "");
	},
	log: (...args: unknown[]) => {
		console.log(...args);
		return String(args[0] ?? "");
	},
	warn: (...args: unknown[]) => {
		console.warn(...args);
		return String(args[0] ?? "");
	},
	error: (...args: unknown[]) => {
		console.error(...args);
		return String(args[0] ?? "");
	},
};

/**
 * How push origins are recorded.
 *
 * - `"stack"`: every push records its origin on a stack, pops unwind it in order
 * - `"single"`: a single return slot; pushing while already pushed overwrites it
 */
export type PushMode = "stack" | "single";

/**
 * Constructor configuration
 *
 * @template TState - Type of the hosted states
 */
export type FSMEngineConfig<TState> = {
	/** States registered in this order at construction. The first one becomes current. */
	states?: readonly TState[];
	/** Push origin bookkeeping (default: "stack") */
	pushMode?: PushMode;
	/**
	 * When true, `addState` records the current state as the previous state,
	 * as older engines did (default: false).
	 */
	recordPreviousOnAdd?: boolean;
	/** Maximum nesting of transitions requested from inside enter/exit hooks (default: 32) */
	maxTransitionDepth?: number;
	/** Enable debug logging (default: false) */
	debug?: boolean;
	/** Custom logger implementing Logger interface (default: console) */
	logger?: Logger;
};

/**
 * Snapshot of the engine bookkeeping sent to subscribers.
 */
export type PublishedState<TState> = {
	current: TState | null;
	previous: TState | null;
	pushedFrom: TState | null;
	pushDepth: number;
};

export const DEFAULT_MAX_TRANSITION_DEPTH = 32;

/**
 * Factory function to create an engine instance.
 * Equivalent to calling `new FSMEngine(config)`.
 *
 * @example
 * ```typescript
 * const fsm = createFsmEngine<unknown, PlayerState>({ debug: true });
 * fsm.addState(idle); // idle is now current
 * fsm.addState(walk);
 * ```
 */
export function createFsmEngine<
	TPayload = FSMPayload,
	TState extends FSMState<TPayload> = FSMState<TPayload>
>(config: FSMEngineConfig<TState> = {}): FSMEngine<TPayload, TState> {
	return new FSMEngine<TPayload, TState>(config);
}

/**
 * A pushdown finite state machine driving one entity across the frames of a game loop.
 *
 * The host loop calls the frame hooks (`update`, `fixedUpdate`, `lateUpdate`,
 * `render`, `postRender`, or `frame` for all of them), which are forwarded to
 * the current state. The current state decides when to transition, typically
 * from its `reason` hook, by calling one of:
 *
 * - `goToState(target, payload?)` - exit current, enter target
 * - `goToPreviousState()` - toggle back to the state active before the last direct transition
 * - `pushState(target, payload?)` - suspend current without exiting it, enter target
 * - `popState()` - exit the pushed state and resume the suspended one without re-entering it
 *
 * Transitions are synchronous. Misuse never throws: every failure is logged,
 * published to `onError` subscribers, and the operation returns `false`
 * leaving the bookkeeping untouched.
 *
 * @template TPayload - Type of the payload passed to `onEnter`
 * @template TState - Type of the hosted states
 *
 * @example
 * ```typescript
 * const fsm = new FSMEngine<unknown, PlayerState>();
 * fsm.addState(idle);
 * fsm.addState(walk);
 *
 * // in the host loop
 * fsm.frame();
 * ```
 */
export class FSMEngine<
	TPayload = FSMPayload,
	TState extends FSMState<TPayload> = FSMState<TPayload>
> {
	/** Registered states, insertion ordered, identity keyed */
	#states = new Set<TState>();

	#current: TState | null = null;

	/** Target of the transition in flight */
	#next: TState | null = null;

	/** Transition history (direct transitions only) */
	#previous: TState | null = null;

	/** Push origins, most recent last */
	#pushed: TState[] = [];

	/** Nesting depth of transitions in flight */
	#depth = 0;

	/** Count of committed state changes, used to spot a nested transition taking over */
	#commits = 0;

	/** State whose `onExit` is running */
	#exiting: TState | null = null;

	#pushMode: PushMode;

	#recordPreviousOnAdd: boolean;

	#maxDepth: number;

	/** Internal pub sub */
	#pubsub = createPubSub();

	/** Logger instance */
	#logger: Logger;

	/** Debug mode flag */
	#debug: boolean;

	/**
	 * Creates a new engine instance.
	 * @param config - Optional initial states and behavior switches
	 */
	constructor(config: FSMEngineConfig<TState> = {}) {
		this.#debug = config.debug ?? false;
		this.#logger = config.logger ?? defaultLogger;
		this.#pushMode = config.pushMode ?? "stack";
		this.#recordPreviousOnAdd = config.recordPreviousOnAdd ?? false;
		this.#maxDepth = config.maxTransitionDepth ?? DEFAULT_MAX_TRANSITION_DEPTH;
		for (const state of config.states ?? []) this.addState(state);
		this.#debugLog(`engine created with ${this.#states.size} state(s)`);
	}

	/** Log debug message if debug mode is enabled */
	#debugLog(...args: unknown[]): void {
		if (this.#debug) {
			this.#logger.debug("[FSM]", ...args);
		}
	}

	#report(error: FSMError<TState>): false {
		this.#logger.error("[FSM]", error.message);
		this.#pubsub.publish("error", error);
		return false;
	}

	#getNotifyData(): PublishedState<TState> {
		return {
			current: this.#current,
			previous: this.#previous,
			pushedFrom: this.pushedFromState,
			pushDepth: this.#pushed.length,
		};
	}

	#notify() {
		this.#pubsub.publish("change", this.#getNotifyData());
	}

	/** Returns whether debug mode is enabled. */
	get debug(): boolean {
		return this.#debug;
	}

	/** Returns the logger instance used by this engine. */
	get logger(): Logger {
		return this.#logger;
	}

	get pushMode(): PushMode {
		return this.#pushMode;
	}

	/** The active state, `null` only until the first state is registered. */
	get currentState(): TState | null {
		return this.#current;
	}

	/** Target of the transition in flight, `null` outside of a transition. */
	get nextState(): TState | null {
		return this.#next;
	}

	/** The state `goToPreviousState()` would return to. */
	get previousState(): TState | null {
		return this.#previous;
	}

	/** The state `popState()` would restore. */
	get pushedFromState(): TState | null {
		return this.#pushed.at(-1) ?? null;
	}

	/** True while a pushed state is active and not yet popped. */
	get isPushed(): boolean {
		return this.#pushed.length > 0;
	}

	/** Number of unpaired pushes. Never more than 1 in "single" push mode. */
	get pushDepth(): number {
		return this.#pushed.length;
	}

	/** Nesting depth of the transitions currently in flight. */
	get transitionDepth(): number {
		return this.#depth;
	}

	/** Registered states in insertion order. */
	get states(): readonly TState[] {
		return [...this.#states];
	}

	get size(): number {
		return this.#states.size;
	}

	/** Checks whether the state (by identity) is registered. */
	has(state: TState): boolean {
		return this.#states.has(state);
	}

	/** Checks whether the state (by identity) is the current one. */
	is(state: TState): boolean {
		return this.#current === state;
	}

	/**
	 * Subscribes to bookkeeping changes.
	 * The callback is invoked immediately and after every successful transition.
	 *
	 * @example
	 * ```typescript
	 * const unsub = fsm.subscribe(({ current, previous }) => {
	 *   console.log(`now in ${current?.name}, was in ${previous?.name}`);
	 * });
	 * ```
	 */
	subscribe(cb: (data: PublishedState<TState>) => void): Unsubscriber {
		this.#debugLog("subscribe() called");
		const unsub = this.#pubsub.subscribe("change", cb);
		cb(this.#getNotifyData());
		return unsub;
	}

	/** Subscribes to reported failures. */
	onError(cb: (error: FSMError<TState>) => void): Unsubscriber {
		return this.#pubsub.subscribe("error", cb);
	}

	/**
	 * Registers a state.
	 *
	 * The first state added to an empty engine becomes the current state.
	 * Adding a state that is already registered is reported as `DuplicateState`.
	 *
	 * @returns `true` if the state was added
	 */
	addState(state: TState | null | undefined): boolean {
		if (state == null) return this.#report(FSMError.nullTarget<TState>("addState"));
		this.#debugLog(`addState("${describeState(state)}")`);

		if (this.#states.size === 0) {
			this.#states.add(state);
			this.#current = state;
			this.#notify();
			return true;
		}

		if (this.#states.has(state)) {
			return this.#report(FSMError.duplicate(state));
		}

		this.#states.add(state);
		if (this.#recordPreviousOnAdd) {
			this.#previous = this.#current;
			this.#notify();
		}
		return true;
	}

	/**
	 * Unregisters a state. Current, previous and pushed bookkeeping is left
	 * untouched, so the current state may end up unregistered.
	 *
	 * @returns `true` if the state was removed
	 */
	deleteState(state: TState | null | undefined): boolean {
		if (state == null) return this.#report(FSMError.nullTarget<TState>("deleteState"));
		if (!this.#states.delete(state)) {
			return this.#report(FSMError.notFound("deleteState", state));
		}
		this.#debugLog(`deleteState("${describeState(state)}")`);
		return true;
	}

	/**
	 * Exits the current state and enters `target`.
	 *
	 * Execution order:
	 * 1. `onExit` of the current state
	 * 2. previous state is set to the departed one, current state to `target`
	 * 3. `onEnter(payload)` of `target`
	 *
	 * Transitions requested from within these hooks run to completion before
	 * this one returns. One requested from `onExit` takes over: the departing
	 * state is not exited again and `target` is not entered.
	 *
	 * @returns `true` if the transition happened, `false` if it failed or was taken over
	 */
	goToState(target: TState | null | undefined, payload?: TPayload): boolean {
		if (target == null) return this.#report(FSMError.nullTarget<TState>("goToState"));
		const failure = this.#check("goToState", target);
		if (failure) return this.#report(failure);

		this.#debugLog(`goToState("${describeState(target)}")`);
		return this.#run(target, () => {
			const from = this.#current;
			if (!this.#exit(from)) return false;
			this.#previous = from;
			this.#commit(target);
			this.#enter(target, payload);
			return true;
		});
	}

	/**
	 * Exits the current state and re-enters the previous one. The departed
	 * state becomes the new previous state, so repeated calls toggle between
	 * the two most recent states.
	 *
	 * @returns `true` if the transition happened
	 */
	goToPreviousState(): boolean {
		const target = this.#previous;
		if (target === null) return this.#report(FSMError.noHistory<TState>("goToPreviousState"));
		const failure = this.#check("goToPreviousState", target);
		if (failure) return this.#report(failure);

		this.#debugLog(`goToPreviousState("${describeState(target)}")`);
		return this.#run(target, () => {
			const from = this.#current;
			if (!this.#exit(from)) return false;
			this.#previous = from;
			this.#commit(target);
			target.onEnter?.();
			return true;
		});
	}

	/**
	 * Suspends the current state (without calling its `onExit`) and enters `target`.
	 * Previous state used by `goToPreviousState` is not affected.
	 *
	 * In "single" push mode, pushing while already pushed replaces the
	 * recorded return point.
	 *
	 * @returns `true` if the transition happened
	 */
	pushState(target: TState | null | undefined, payload?: TPayload): boolean {
		if (target == null) return this.#report(FSMError.nullTarget<TState>("pushState"));
		const failure = this.#check("pushState", target);
		if (failure) return this.#report(failure);

		this.#debugLog(`pushState("${describeState(target)}")`);
		return this.#run(target, () => {
			const from = this.#current;
			if (from) {
				if (this.#pushMode === "single") this.#pushed = [from];
				else this.#pushed.push(from);
			}
			this.#commit(target);
			this.#enter(target, payload);
			return true;
		});
	}

	/**
	 * Exits the pushed state and resumes the state it was pushed from,
	 * without calling the resumed state's `onEnter`.
	 *
	 * @returns `true` if the transition happened
	 */
	popState(): boolean {
		const target = this.pushedFromState;
		if (target === null) return this.#report(FSMError.noHistory<TState>("popState"));
		const failure = this.#check("popState", target);
		if (failure) return this.#report(failure);

		this.#debugLog(`popState("${describeState(target)}")`);
		return this.#run(target, () => {
			if (!this.#exit(this.#current)) return false;
			this.#pushed.pop();
			this.#commit(target);
			return true;
		});
	}

	/** Forwards the main update phase to the current state. */
	update(): void {
		this.#current?.onUpdate?.();
	}

	/** Forwards the fixed-timestep phase to the current state. */
	fixedUpdate(): void {
		this.#current?.onFixedUpdate?.();
	}

	/**
	 * Forwards the late update phase, then the `reason` check, to the current state.
	 * If `onLateUpdate` transitioned, the new state's `reason` runs.
	 */
	lateUpdate(): void {
		this.#current?.onLateUpdate?.();
		this.#current?.reason?.();
	}

	render(): void {
		this.#current?.onRender?.();
	}

	postRender(): void {
		this.#current?.onPostRender?.();
	}

	/**
	 * Runs one whole frame: update, fixed update, late update (with reason),
	 * render and post render, in this order.
	 */
	frame(): void {
		this.update();
		this.fixedUpdate();
		this.lateUpdate();
		this.render();
		this.postRender();
	}

	/** Validates a transition target. Returns the failure to report, if any. */
	#check(operation: FSMOperation, target: TState): FSMError<TState> | null {
		if (!this.#states.has(target)) {
			return FSMError.notFound(operation, target);
		}
		if (this.#depth >= this.#maxDepth) {
			return FSMError.depthExceeded(operation, target, this.#maxDepth);
		}
		return null;
	}

	#enter(target: TState, payload: TPayload | undefined): void {
		if (payload === undefined) target.onEnter?.();
		else target.onEnter?.(payload);
	}

	#commit(target: TState): void {
		this.#current = target;
		this.#commits++;
	}

	/**
	 * Calls `onExit` of the departing state, unless that state is already
	 * exiting further up the call stack. Returns `false` if a transition
	 * requested from the hook changed the current state meanwhile.
	 */
	#exit(from: TState | null): boolean {
		const commits = this.#commits;
		if (from && from !== this.#exiting) {
			const outer = this.#exiting;
			this.#exiting = from;
			try {
				from.onExit?.();
			} finally {
				this.#exiting = outer;
			}
		}
		if (this.#commits === commits) return true;
		this.#debugLog("transition taken over by one requested from onExit");
		return false;
	}

	/**
	 * Runs the exit/enter window of a transition with `nextState` and depth tracked.
	 * Subscribers are notified once, when the outermost transition completes.
	 */
	#run(target: TState, transition: () => boolean): boolean {
		this.#depth++;
		this.#next = target;
		let done = false;
		try {
			done = transition();
		} finally {
			this.#next = null;
			this.#depth--;
		}
		if (this.#depth === 0) this.#notify();
		return done;
	}
}
