export { createRng, type Rng } from "./rng.js";
export { flushMicrotasks } from "./async.js";
export { assert, describe, test } from "./nodeTest.js";
