import assert from "node:assert/strict";
import test from "node:test";

import {
  Deadline,
  DeadlineExceededError,
  RunBudget,
  runWithDeadline,
  type Clock,
} from "../src/core/deadline.js";

function manualClock(start = 0): Clock & { advance(ms: number): void } {
  let now = start;
  return {
    now: () => now,
    advance(ms) {
      now += ms;
    },
  };
}

test("deadline tracks remaining time against its clock", () => {
  const clock = manualClock(1_000);
  const deadline = new Deadline(500, clock);

  assert.equal(deadline.remainingMs(), 500);
  clock.advance(200);
  assert.equal(deadline.remainingMs(), 300);
  assert.equal(deadline.expired, false);
  clock.advance(300);
  assert.equal(deadline.expired, true);
  assert.throws(() => deadline.throwIfExpired(), DeadlineExceededError);
});

test("expiring a deadline aborts its signal with the deadline error", () => {
  const deadline = new Deadline(10_000);

  deadline.expire();

  assert.equal(deadline.signal.aborted, true);
  assert.ok(deadline.signal.reason instanceof DeadlineExceededError);
  assert.equal(deadline.expired, true);
});

test("runWithDeadline returns the work result when it finishes in time", async () => {
  assert.equal(await runWithDeadline(async () => "done", 1_000), "done");
});

test("runWithDeadline rejects slow work and aborts its signal", async () => {
  let observed: AbortSignal | undefined;

  await assert.rejects(
    () =>
      runWithDeadline((deadline) => {
        observed = deadline.signal;
        return new Promise<string>(() => {});
      }, 20),
    /^DeadlineExceededError: deadline of 20ms exceeded$/,
  );
  assert.equal(observed?.aborted, true);
});

test("run budget is exhausted only once elapsed time passes the total", () => {
  const clock = manualClock();
  const budget = new RunBudget(300, clock);

  clock.advance(300);
  assert.equal(budget.exhausted, false);
  clock.advance(1);
  assert.equal(budget.exhausted, true);
  assert.equal(budget.elapsedMs(), 301);
});
