/**
 * Grouped in-memory cache owned by a Database.
 *
 * Keys live in named groups; operations without a group use "default".
 */

export const DEFAULT_GROUP = "default";

export class Cache {
	#groups = new Map<string, Map<string, unknown>>([[DEFAULT_GROUP, new Map()]]);

	set(key: string, value: unknown, group: string = DEFAULT_GROUP): void {
		let entries = this.#groups.get(group);
		if (!entries) {
			entries = new Map();
			this.#groups.set(group, entries);
		}
		entries.set(key, value);
	}

	/**
	 * @returns The cached value, or undefined when absent
	 */
	get(key: string, group: string = DEFAULT_GROUP): unknown {
		return this.#groups.get(group)?.get(key);
	}

	/**
	 * Typed read: the cached value if the guard accepts it.
	 */
	pick<T>(
		key: string,
		guard: (value: unknown) => value is T,
		group: string = DEFAULT_GROUP,
	): T | undefined {
		const value = this.get(key, group);
		return guard(value) ? value : undefined;
	}

	has(key: string, group: string = DEFAULT_GROUP): boolean {
		return this.#groups.get(group)?.has(key) ?? false;
	}

	delete(key: string, group: string = DEFAULT_GROUP): boolean {
		return this.#groups.get(group)?.delete(key) ?? false;
	}

	/**
	 * Clear one group, or every group when none is given.
	 */
	clear(group?: string): void {
		if (group === undefined) {
			this.#groups = new Map([[DEFAULT_GROUP, new Map()]]);
			return;
		}
		this.#groups.get(group)?.clear();
	}
}
