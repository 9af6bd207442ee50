import { ImmediateDriver } from "./drivers/immediate";
import { TimeoutDriver } from "./drivers/timeout";

export { ImmediateDriver, TimeoutDriver };

/**
 * Interface for loop drivers that call the network tick.
 * Drivers are responsible for scheduling the update callback and
 * measuring the time between calls.
 */
export interface LoopDriver {
    /** Starts the loop */
    start(): void;
    /** Stops the loop and cancels the pending iteration */
    stop(): void;
    /** Whether the loop is scheduled */
    readonly running: boolean;
    /** Update callback invoked each iteration with delta time in seconds */
    update(dt: number): void;
}

/**
 * Type of driver to use.
 * - `'timeout'`: setTimeout with a 1ms delay, yields to socket I/O between ticks
 * - `'immediate'`: setImmediate, runs as fast as the event loop allows
 */
export type DriverType = 'timeout' | 'immediate';

/**
 * Factory function to create a loop driver.
 *
 * @param type - Scheduling strategy
 * @param update - Callback function invoked each iteration with delta time in seconds
 * @returns A configured LoopDriver instance ready to start
 *
 * @example
 * ```typescript
 * const driver = createDriver('timeout', (dt) => context.tick(dt));
 * driver.start();
 * ```
 */
export function createDriver(type: DriverType, update: (dt: number) => void): LoopDriver {
    if (type === 'immediate') {
        return new ImmediateDriver(update);
    }
    return new TimeoutDriver(update);
}
