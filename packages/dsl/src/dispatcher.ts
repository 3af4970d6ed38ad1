import type { OperatorFn } from "./context";

/** Read-only operator table shared by every evaluation. */
export interface Dispatcher {
	has(name: string): boolean;
	get(name: string): OperatorFn | undefined;
	names(): string[];
}

class FrozenDispatcher implements Dispatcher {
	private readonly table: ReadonlyMap<string, OperatorFn>;

	constructor(entries: Iterable<[string, OperatorFn]>) {
		this.table = new Map(entries);
		Object.freeze(this);
	}

	has(name: string): boolean {
		return this.table.has(name);
	}

	get(name: string): OperatorFn | undefined {
		return this.table.get(name);
	}

	names(): string[] {
		return Array.from(this.table.keys()).sort();
	}
}

export class DispatcherBuilder {
	private readonly operators = new Map<string, OperatorFn>();
	private built = false;

	register(name: string, fn: OperatorFn): this {
		if (this.built) {
			throw new Error("Dispatcher already built; operators can no longer be registered");
		}
		if (this.operators.has(name)) {
			throw new Error(`Operator "${name}" is already registered`);
		}
		this.operators.set(name, fn);
		return this;
	}

	registerAll(operators: Readonly<Record<string, OperatorFn>>): this {
		for (const [name, fn] of Object.entries(operators)) {
			this.register(name, fn);
		}
		return this;
	}

	build(): Dispatcher {
		this.built = true;
		return new FrozenDispatcher(this.operators);
	}
}
