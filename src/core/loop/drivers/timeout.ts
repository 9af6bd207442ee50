import type { LoopDriver } from "../loop";

/**
 * Minimal delay for setTimeout-based loop scheduling.
 * 1ms lets the event loop deliver socket callbacks between ticks.
 */
const TIMEOUT_DELAY = 1;

/**
 * Loop driver using setTimeout.
 *
 * Socket `data` and `message` callbacks run between iterations and only
 * enqueue work, so each tick sees whatever arrived since the previous one.
 *
 * Delta time is calculated between iterations and passed to the update callback in seconds.
 *
 * @example
 * ```typescript
 * const driver = new TimeoutDriver((dt) => context.tick(dt));
 * driver.start();
 * ```
 */
export class TimeoutDriver implements LoopDriver {
    /**
     * @param update - Callback invoked each tick with delta time in seconds
     */
    constructor(public update: (dt: number) => void) { }

    private last = performance.now();
    private timer: ReturnType<typeof setTimeout> | null = null;

    get running(): boolean {
        return this.timer !== null;
    }

    /**
     * Starts the loop. Resets timing to prevent a large initial delta.
     */
    start() {
        if (this.running) return;
        this.last = performance.now();
        this.schedule();
    }

    stop() {
        if (this.timer !== null) {
            clearTimeout(this.timer);
            this.timer = null;
        }
    }

    private schedule() {
        this.timer = setTimeout(this.loop, TIMEOUT_DELAY);
    }

    private loop = () => {
        const now = performance.now();
        const dt = (now - this.last) / 1000;
        this.last = now;

        this.update(dt);

        // update() may have stopped the loop
        if (this.timer !== null) this.schedule();
    };
}
