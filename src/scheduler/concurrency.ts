import { SupersededError } from "../core/errors.js";

export type LockHolder = {
	runId: string;
	/** Asks the holder's in-flight jobs to stop. */
	cancel: (reason: SupersededError) => void;
};

export type ConcurrencyLease = {
	group: string;
	runId: string;
	/** Run that was cancelled to make room for this one, if any. */
	superseded?: string;
	release(): void;
};

type ActiveHolder = LockHolder & {
	released: Promise<void>;
	markReleased: () => void;
};

export type AcquireOptions = {
	onSupersede?: (previousRunId: string) => void;
	/** Once aborted, a queued acquisition gives up instead of superseding. */
	signal?: AbortSignal;
};

/**
 * One active run per concurrency group. A newcomer cancels the current
 * holder and waits for it to release before it proceeds; acquisitions for the
 * same group are serialized so supersession happens in trigger order.
 */
export class ConcurrencyRegistry {
	private readonly holders = new Map<string, ActiveHolder>();
	private readonly tails = new Map<string, Promise<void>>();

	async acquire(group: string, holder: LockHolder, options: AcquireOptions = {}): Promise<ConcurrencyLease> {
		const previousTail = this.tails.get(group) ?? Promise.resolve();
		let unlock = (): void => {};
		const turn = new Promise<void>((resolve) => {
			unlock = resolve;
		});
		const tail = previousTail.then(() => turn);
		this.tails.set(group, tail);

		await previousTail;
		let superseded: string | undefined;
		try {
			if (options.signal?.aborted) {
				throw options.signal.reason;
			}
			const current = this.holders.get(group);
			if (current) {
				superseded = current.runId;
				options.onSupersede?.(current.runId);
				current.cancel(new SupersededError(current.runId, holder.runId));
				await current.released;
			}

			let markReleased = (): void => {};
			const released = new Promise<void>((resolve) => {
				markReleased = resolve;
			});
			this.holders.set(group, { ...holder, released, markReleased });
		} finally {
			unlock();
			if (this.tails.get(group) === tail) {
				this.tails.delete(group);
			}
		}

		let done = false;
		return {
			group,
			runId: holder.runId,
			...(superseded ? { superseded } : {}),
			release: () => {
				if (done) {
					return;
				}
				done = true;
				const active = this.holders.get(group);
				if (active && active.runId === holder.runId) {
					this.holders.delete(group);
					active.markReleased();
				}
			},
		};
	}

	holderOf(group: string): string | undefined {
		return this.holders.get(group)?.runId;
	}
}
