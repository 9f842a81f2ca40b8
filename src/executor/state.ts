import { InvariantViolationError } from "../core/errors.js";

export type ExecutorState =
	| { phase: "pending" }
	| { phase: "running"; stepIndex: number }
	| { phase: "succeeded" }
	| { phase: "failed"; stepIndex: number }
	| { phase: "canceled"; stepIndex?: number }
	| { phase: "timed-out"; stepIndex?: number };

/**
 * Forward-only lifecycle of one job: step indices only increase and a terminal
 * phase is never left.
 */
export class JobStateMachine {
	private current: ExecutorState = { phase: "pending" };

	constructor(private readonly jobId: string) {}

	get state(): ExecutorState {
		return this.current;
	}

	isTerminal(): boolean {
		return !(this.current.phase === "pending" || this.current.phase === "running");
	}

	startStep(stepIndex: number): void {
		const expected = this.current.phase === "running" ? this.current.stepIndex + 1 : 0;
		if (this.isTerminal() || stepIndex !== expected) {
			this.reject(`start step ${stepIndex}`);
		}
		this.current = { phase: "running", stepIndex };
	}

	succeed(): void {
		this.ensureActive("succeed");
		this.current = { phase: "succeeded" };
	}

	fail(stepIndex: number): void {
		if (this.current.phase !== "running" || this.current.stepIndex !== stepIndex) {
			this.reject(`fail step ${stepIndex}`);
		}
		this.current = { phase: "failed", stepIndex };
	}

	cancel(): void {
		this.ensureActive("cancel");
		this.current = { phase: "canceled", stepIndex: this.activeStep() };
	}

	timeOut(): void {
		this.ensureActive("time out");
		this.current = { phase: "timed-out", stepIndex: this.activeStep() };
	}

	private activeStep(): number | undefined {
		return this.current.phase === "running" ? this.current.stepIndex : undefined;
	}

	private ensureActive(action: string): void {
		if (this.isTerminal()) {
			this.reject(action);
		}
	}

	private reject(action: string): never {
		throw new InvariantViolationError(
			`Job ${this.jobId}: cannot ${action} from ${describe(this.current)}`,
		);
	}
}

function describe(state: ExecutorState): string {
	return state.phase === "running" || state.phase === "failed"
		? `${state.phase}(${state.stepIndex})`
		: state.phase;
}
