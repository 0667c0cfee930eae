import type { InferenceContext } from './inference-context.ts';
import { Mutex } from 'async-mutex';


export class Throttle {
	private valve = new Mutex();
	private interval: number;
	public constructor(private rpm: number) {
		this.interval = Math.ceil(60*1000 / this.rpm);
	}

	/**
	 * Resolves when the next request may be sent. A wait given up on abort
	 * holds no slot.
	 */
	public async requests(ctx: InferenceContext): Promise<void> {
		const waiting = this.valve.acquire();
		let onAbort = () => {};
		const aborted = new Promise<never>((_resolve, reject) => {
			onAbort = () => reject(ctx.signal?.reason);
			ctx.signal?.addEventListener('abort', onAbort);
		});
		try {
			ctx.signal?.throwIfAborted();
			const release = await Promise.race([waiting, aborted]);
			setTimeout(release, this.interval);
		} catch (e) {
			void waiting.then(release => release());
			throw e;
		} finally {
			ctx.signal?.removeEventListener('abort', onAbort);
		}
	}
}
