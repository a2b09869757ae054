import { assert, describe, sleep, test } from "@tether/testkit";
import { TetherError, isTetherError, raiseFatal } from "../../errors.js";
import { createLogger } from "../../logger.js";
import { createRecordingSink } from "../../testing/index.js";
import { type FatalReport, createDispatchQueue } from "../dispatchQueue.js";

describe("dispatch queue", () => {
  test("runs interleaved posts strictly in enqueue order", async () => {
    const queue = createDispatchQueue();
    const order: string[] = [];
    // Two producers alternating, as two native threads would.
    for (let i = 0; i < 3; i++) {
      queue.post(() => {
        order.push(`a${String(i)}`);
      });
      queue.post(() => {
        order.push(`b${String(i)}`);
      });
    }
    await queue.idle();
    assert.deepEqual(order, ["a0", "b0", "a1", "b1", "a2", "b2"]);
  });

  test("awaits an async task before starting the next", async () => {
    const queue = createDispatchQueue();
    const order: number[] = [];
    queue.post(async () => {
      await sleep(5);
      order.push(1);
    });
    queue.post(() => {
      order.push(2);
    });
    await queue.idle();
    assert.deepEqual(order, [1, 2]);
  });

  test("never runs a task inline", () => {
    const queue = createDispatchQueue();
    let ran = false;
    queue.post(() => {
      ran = true;
    });
    assert.equal(ran, false);
    assert.equal(queue.size(), 1);
  });

  test("a post from inside a task runs after everything already queued", async () => {
    const queue = createDispatchQueue();
    const order: string[] = [];
    queue.post(() => {
      order.push("first");
      queue.post(() => {
        order.push("nested");
      });
    });
    queue.post(() => {
      order.push("second");
    });
    await queue.idle();
    assert.deepEqual(order, ["first", "second", "nested"]);
  });

  test("call resolves with the task result on the worker", async () => {
    const queue = createDispatchQueue();
    assert.equal(await queue.call(() => queue.isExecuting()), true);
    assert.equal(await queue.call(async () => "done"), "done");
    assert.equal(queue.isExecuting(), false);
  });

  test("a failing task is isolated and logged", async () => {
    const rec = createRecordingSink();
    const queue = createDispatchQueue({ logger: createLogger({ sink: rec.sink }) });
    const failing = queue.call(() => {
      throw new Error("handler broke");
    }, "/driver/focus");
    const after = queue.call(() => "still running");

    await assert.rejects(failing, { message: "handler broke" });
    assert.equal(await after, "still running");
    assert.equal(queue.state(), "Running");
    assert.deepEqual(
      rec.records().map((r) => [r.severity, r.message, r.fields.label]),
      [["error", "handler failed on dispatch worker", "/driver/focus"]],
    );
  });

  test("rejects enqueues beyond capacity", async () => {
    const queue = createDispatchQueue({ capacity: 2 });
    queue.post(() => undefined);
    queue.post(() => undefined);
    assert.throws(
      () => queue.post(() => undefined),
      (err: unknown) =>
        isTetherError(err, "TETHER_QUEUE_FULL") &&
        err.message === "dispatch queue is full (capacity=2)",
    );
    await assert.rejects(queue.call(() => 1), (err: unknown) =>
      isTetherError(err, "TETHER_QUEUE_FULL"),
    );
    await queue.idle();
    assert.equal(queue.size(), 0);
  });

  test("close abandons queued entries and refuses new ones", async () => {
    const queue = createDispatchQueue();
    const pending = queue.call(() => "never");
    queue.close();
    queue.close();

    await assert.rejects(pending, (err: unknown) =>
      isTetherError(err, "TETHER_SHUTDOWN") && err.message === "dispatch queue closed",
    );
    assert.throws(
      () => queue.post(() => undefined),
      (err: unknown) => isTetherError(err, "TETHER_SHUTDOWN"),
    );
    assert.equal(queue.state(), "Closed");
    await queue.idle();
  });

  test("close with a reason rejects abandoned callers with it", async () => {
    const queue = createDispatchQueue();
    const pending = queue.call(() => "never");
    const reason = new TetherError("TETHER_SHUTDOWN", "driver run cancelled");
    queue.close(reason);
    await assert.rejects(pending, (err: unknown) => err === reason);
  });

  test("a fatal fault reports, faults the queue and abandons the rest", async () => {
    const queue = createDispatchQueue({ now: () => 100 });
    const reports: FatalReport[] = [];
    const unsubscribe = queue.onFatal((report) => {
      reports.push(report);
    });

    queue.post(() => raiseFatal("broken invariant"), "/driver/run");
    const behind = queue.call(() => 1, "behind");

    await assert.rejects(behind, (err: unknown) =>
      isTetherError(err, "TETHER_SHUTDOWN") &&
      err.message === "dispatch queue faulted: broken invariant",
    );
    assert.equal(queue.state(), "Faulted");
    assert.equal(reports.length, 1);
    const [report] = reports;
    assert.equal(report?.code, "TETHER_FATAL");
    assert.equal(report?.detail, "broken invariant");
    assert.equal(report?.label, "/driver/run");
    assert.equal(report?.atMs, 100);
    assert.equal(queue.fatalReport(), report);
    assert.throws(
      () => queue.post(() => undefined),
      (err: unknown) => isTetherError(err, "TETHER_SHUTDOWN"),
    );
    unsubscribe();
  });

  test("idle resolves immediately when nothing is queued", async () => {
    const queue = createDispatchQueue();
    await queue.idle();
    assert.equal(queue.size(), 0);
  });

  test("rejects a non-positive capacity", () => {
    assert.throws(
      () => createDispatchQueue({ capacity: 0 }),
      (err: unknown) => isTetherError(err, "TETHER_INVALID_PROPS"),
    );
  });
});
