// Types
export type { WaitForEventOptions } from "./types";

// Timeout utilities
export { withTimeout } from "./timeout";

// Subscribe-then-act waits
export { waitForEvent } from "./wait";
