/* ---------- Types ---------- */
type Callback<Props> = (props: Props) => void;

/**
 * @description
 * Map of event name to payload type, e.g.
 * `{ connected: { clientId: string }; disconnected: { reason: string } }`.
 */
export type EventMap = { [name: string]: unknown };

/* ---------- Interfaces ---------- */
interface EventSystemProps {
    /**
     * @description
     * Prefix for handler error logs, e.g. "SessionManager".
     */
    name?: string;
}

/**
 * @description
 * Typed observer registry. Each event name carries exactly one payload type,
 * and a handler that throws is logged without stopping the fan-out to the
 * remaining handlers.
 */
export class EventSystem<Events extends EventMap> {
    /**
     * @private
     * @description
     * Registered callbacks per event name, created lazily.
    */
    private callbacks: { [K in keyof Events]?: Set<Callback<Events[K]>> } = {};

    private readonly name: string;

    constructor({ name = "EventSystem" }: EventSystemProps = {}) {
        this.name = name;
    }

    private handlersFor<K extends keyof Events>(name: K): Set<Callback<Events[K]>> {
        const existing = this.callbacks[name];
        if (existing) return existing;

        const set = new Set<Callback<Events[K]>>();
        this.callbacks[name] = set;
        return set;
    }

    /**
     * @description
     * Registers a callback for an event.
     *
     * @returns Function that removes the callback again
     */
    on<K extends keyof Events>(name: K, callback: Callback<Events[K]>): () => void {
        this.handlersFor(name).add(callback);
        return () => this.off(name, callback);
    }

    /**
     * @description
     * Registers a callback that runs on the next emit only.
     */
    once<K extends keyof Events>(name: K, callback: Callback<Events[K]>): () => void {
        const wrapper: Callback<Events[K]> = (props) => {
            this.off(name, wrapper);
            callback(props);
        };

        return this.on(name, wrapper);
    }

    /**
     * @description
     * Emits an event, running all registered callbacks in registration order.
     */
    emit<K extends keyof Events>(name: K, data: Events[K]): void {
        const set = this.callbacks[name];
        if (!set || set.size === 0) return;

        // Snapshot so handlers may unsubscribe while the event is being delivered
        for (const callback of Array.from(set)) {
            try {
                callback(data);
            } catch (error) {
                console.error(`[${this.name}] Error in "${String(name)}" handler: ${error}`);
            }
        }
    }

    /**
     * @description
     * Removes a callback from an event.
     */
    off<K extends keyof Events>(name: K, callback: Callback<Events[K]>): void {
        this.callbacks[name]?.delete(callback);
    }

    /**
     * @description
     * Number of callbacks registered for an event.
     */
    listenerCount<K extends keyof Events>(name: K): number {
        return this.callbacks[name]?.size ?? 0;
    }

    /**
     * @description
     * Removes all callbacks, or only those of one event.
     */
    clear<K extends keyof Events>(name?: K): void {
        if (name === undefined) {
            this.callbacks = {};
            return;
        }

        this.callbacks[name]?.clear();
    }
}
