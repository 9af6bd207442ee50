/**
 * @module core
 *
 * Building blocks shared by the networking layers.
 */

export * from "./dispatch/dispatch-queue";
export * from "./events/event-system";
export * from "./loop/loop";
export * from "./lerp/lerp";
export * from "./backoff/backoff";
export * from "./rate-limit/rate-limiter";
