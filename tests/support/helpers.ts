import {
	FSMEngine,
	type FSMEngineConfig,
	type FSMError,
	type FSMState,
	type Logger,
} from "../../src/mod.ts";

/**
 * State which records every hook call into a shared log as "<hook>:<name>".
 * The optional actions run after the corresponding entry was logged.
 */
export class RecordingState implements FSMState {
	readonly enterArgs: unknown[][] = [];
	enterAction?: () => void;
	exitAction?: () => void;
	lateAction?: () => void;
	reasonAction?: () => void;

	constructor(public readonly name: string, private readonly log: string[]) {}

	onEnter(...args: unknown[]): void {
		this.enterArgs.push(args);
		this.log.push(`enter:${this.name}`);
		this.enterAction?.();
	}

	onExit(): void {
		this.log.push(`exit:${this.name}`);
		this.exitAction?.();
	}

	onUpdate(): void {
		this.log.push(`update:${this.name}`);
	}

	onFixedUpdate(): void {
		this.log.push(`fixed:${this.name}`);
	}

	onLateUpdate(): void {
		this.log.push(`late:${this.name}`);
		this.lateAction?.();
	}

	reason(): void {
		this.log.push(`reason:${this.name}`);
		this.reasonAction?.();
	}

	onRender(): void {
		this.log.push(`render:${this.name}`);
	}

	onPostRender(): void {
		this.log.push(`postRender:${this.name}`);
	}
}

export type LogLine = { level: keyof Logger; text: string };

/** Logger that keeps every line in memory instead of printing it. */
export function createCaptureLogger() {
	const lines: LogLine[] = [];
	const write =
		(level: keyof Logger) =>
		(...args: unknown[]): string => {
			lines.push({ level, text: args.map(String).join(" ") });
			return String(args[0] ?? "");
		};
	const logger: Logger = {
		debug: write("debug"),
		log: write("log"),
		warn: write("warn"),
		error: write("error"),
	};
	const texts = (level: keyof Logger) =>
		lines.filter((l) => l.level === level).map((l) => l.text);
	return { logger, lines, texts };
}

/**
 * Creates an engine with a capturing logger, an error collector and four
 * unregistered recording states (A, B, C and X) sharing one log.
 */
export function setup(config: Omit<FSMEngineConfig<RecordingState>, "logger"> = {}) {
	const log: string[] = [];
	const capture = createCaptureLogger();
	const fsm = new FSMEngine<unknown, RecordingState>({
		...config,
		logger: capture.logger,
	});
	const errors: FSMError<RecordingState>[] = [];
	fsm.onError((e) => errors.push(e));
	return {
		fsm,
		log,
		errors,
		capture,
		a: new RecordingState("A", log),
		b: new RecordingState("B", log),
		c: new RecordingState("C", log),
		x: new RecordingState("X", log),
	};
}
