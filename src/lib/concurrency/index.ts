export { Semaphore } from "./semaphore.js";
export { withTimeout } from "./timeout.js";
