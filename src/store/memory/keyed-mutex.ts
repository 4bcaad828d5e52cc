/**
 * FIFO mutex per string key. `acquire` resolves once every earlier holder of
 * the same key has released it.
 */
export class KeyedMutex {
	private readonly tails = new Map<string, Promise<void>>();

	async acquire(key: string): Promise<() => void> {
		const previous = this.tails.get(key) ?? Promise.resolve();
		let release: () => void = () => {};
		const held = new Promise<void>((resolve) => {
			release = resolve;
		});
		const tail = previous.then(() => held);
		this.tails.set(key, tail);
		await previous;

		let released = false;
		return () => {
			if (released) return;
			released = true;
			release();
			if (this.tails.get(key) === tail) {
				this.tails.delete(key);
			}
		};
	}

	isLocked(key: string): boolean {
		return this.tails.has(key);
	}
}
