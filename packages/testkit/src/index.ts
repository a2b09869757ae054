export { assert, describe, test } from "./nodeTest.js";
export { flushMicrotasks, sleep } from "./async.js";
