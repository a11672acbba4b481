import { EventEmitter } from "eventemitter3";

/**
 * Event name → handler signature. Declare maps with `type`, not `interface`,
 * so they satisfy the index signature.
 */
// biome-ignore lint/suspicious/noExplicitAny: base constraint for event handler signatures
export type EventMap = Record<string, (...args: any[]) => void>;

/**
 * eventemitter3 with handler signatures checked at compile time.
 *
 * @example
 * ```ts
 * type Events = { filled: (orderId: string) => void };
 * const emitter = new TypedEmitter<Events>();
 * emitter.on("filled", (id) => log(id));
 * ```
 */
export class TypedEmitter<TEvents extends EventMap> {
	private readonly ee = new EventEmitter();

	on<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.on(event, handler);
		return this;
	}

	off<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.off(event, handler);
		return this;
	}

	once<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.once(event, handler);
		return this;
	}

	/** Invokes every handler for `event`; returns whether any were registered. */
	emit<K extends keyof TEvents & string>(event: K, ...args: Parameters<TEvents[K]>): boolean {
		return this.ee.emit(event, ...args);
	}

	listenerCount<K extends keyof TEvents & string>(event: K): number {
		return this.ee.listenerCount(event);
	}

	removeAllListeners(): this {
		this.ee.removeAllListeners();
		return this;
	}
}
