import assert from "node:assert/strict";
import test from "node:test";

import {
  ConnectionStateMachine,
  IllegalTransitionError,
  TRANSITIONS,
  type ConnectionState,
} from "../src/connection/state.ts";

test("state: a keep-alive exchange walks the expected path", () => {
  const machine = new ConnectionStateMachine();
  const seen: string[] = [];
  machine.onTransition((from, to) => seen.push(`${from}->${to}`));

  for (const to of [
    "reading-head",
    "awaiting-body",
    "writing-response",
    "keep-alive-wait",
    "reading-head",
    "writing-response",
    "closing",
    "closed",
  ] satisfies ConnectionState[]) {
    machine.transition(to);
  }

  assert.deepEqual(seen, [
    "idle->reading-head",
    "reading-head->awaiting-body",
    "awaiting-body->writing-response",
    "writing-response->keep-alive-wait",
    "keep-alive-wait->reading-head",
    "reading-head->writing-response",
    "writing-response->closing",
    "closing->closed",
  ]);
  assert.equal(machine.terminal, true);
});

test("state: illegal moves throw and leave the state unchanged", () => {
  const machine = new ConnectionStateMachine("keep-alive-wait");
  assert.throws(
    () => machine.transition("writing-response"),
    (err) =>
      err instanceof IllegalTransitionError &&
      err.from === "keep-alive-wait" &&
      err.to === "writing-response" &&
      err.message === "illegal connection transition keep-alive-wait -> writing-response",
  );
  assert.equal(machine.state, "keep-alive-wait");
});

test("state: upgraded connections can only close", () => {
  const machine = new ConnectionStateMachine("writing-response");
  machine.transition("upgraded");
  assert.equal(machine.speaksHttp, false);
  assert.equal(machine.can("reading-head"), false);
  assert.equal(machine.can("closing"), true);
});

test("state: closed is terminal", () => {
  assert.deepEqual(TRANSITIONS.closed, []);
  const machine = new ConnectionStateMachine("closed");
  assert.equal(machine.tryTransition("closing"), false);
  assert.equal(machine.speaksHttp, false);
});

test("state: every live state can be closed", () => {
  for (const state of ["idle", "reading-head", "awaiting-body", "writing-response", "keep-alive-wait"] satisfies ConnectionState[]) {
    assert.equal(new ConnectionStateMachine(state).can("closing"), true, state);
    assert.equal(new ConnectionStateMachine(state).speaksHttp, true, state);
  }
});

test("state: tryTransition ignores self transitions", () => {
  const machine = new ConnectionStateMachine();
  assert.equal(machine.tryTransition("idle"), false);
  assert.equal(machine.tryTransition("reading-head"), true);
  assert.equal(machine.state, "reading-head");
});
