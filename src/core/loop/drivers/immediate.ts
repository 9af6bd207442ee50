import type { LoopDriver } from "../loop";

/**
 * Loop driver using setImmediate. Runs as fast as the event loop allows,
 * still after pending I/O callbacks of each turn.
 */
export class ImmediateDriver implements LoopDriver {
    constructor(public update: (dt: number) => void) { }

    private last = performance.now();
    private handle: ReturnType<typeof setImmediate> | null = null;

    get running(): boolean {
        return this.handle !== null;
    }

    start() {
        if (this.running) return;
        this.last = performance.now();
        this.handle = setImmediate(this.loop);
    }

    stop() {
        if (this.handle !== null) {
            clearImmediate(this.handle);
            this.handle = null;
        }
    }

    private loop = () => {
        const now = performance.now();
        const dt = (now - this.last) / 1000;
        this.last = now;

        this.update(dt);

        if (this.handle !== null) this.handle = setImmediate(this.loop);
    };
}
