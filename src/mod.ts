/**
 * @module
 *
 * A pushdown finite state machine engine for real-time game loops.
 *
 * The engine hosts a set of state objects, forwards the per-frame hooks of the
 * host loop to the current one, and offers direct transitions (with an
 * optional payload), a two-state "go back" toggle, and push/pop suspension.
 *
 * @example Basic usage
 * ```typescript
 * import { FSMEngine, type FSMState } from "pushdown-fsm";
 *
 * const fsm = new FSMEngine();
 * const idle: FSMState = { name: "idle", reason: () => fsm.goToState(walk) };
 * const walk: FSMState = { name: "walk", onEnter: () => playAnimation("walk") };
 * fsm.addState(idle);
 * fsm.addState(walk);
 *
 * // once per frame
 * fsm.frame();
 * ```
 *
 * @example Suspending a state
 * ```typescript
 * fsm.pushState(pauseMenu); // current state is not exited
 * fsm.popState(); // pauseMenu is exited, the suspended state resumes
 * ```
 */

export * from "./fsm.ts";
export * from "./state.ts";
export * from "./errors.ts";
