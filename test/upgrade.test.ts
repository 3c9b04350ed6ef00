import assert from "node:assert/strict";
import test from "node:test";

import type { Handler, OutgoingResponse, UpgradeTunnel } from "../src/connection/handler.ts";
import { injectRequests } from "../src/testing.ts";
import { openConnection, waitFor, within } from "./helpers/connection.ts";

const SWITCHING = "HTTP/1.1 101 Switching Protocols\r\nupgrade: echo\r\nconnection: upgrade\r\n\r\n";

async function echo(tunnel: UpgradeTunnel) {
  for await (const chunk of tunnel) await tunnel.write(chunk);
}

function switchTo(upgrade: OutgoingResponse["upgrade"]): OutgoingResponse {
  return { status: 101, headers: { upgrade: "echo", connection: "upgrade" }, upgrade };
}

test("upgrade: 101 hands the connection and early bytes to the callback", async () => {
  const handler: Handler = async () => switchTo(echo);
  const { connection, transport, output, responses } = await injectRequests(
    handler,
    "GET /chat HTTP/1.1\r\nHost: a\r\nConnection: Upgrade\r\nUpgrade: echo\r\n\r\nearly",
  );

  assert.equal(output.toString("latin1"), `${SWITCHING}early`);
  assert.equal(responses.length, 1);
  assert.equal(responses[0]?.leftover.toString(), "early");
  assert.equal(connection.state, "closed");
  assert.equal(transport.ended, true);
  assert.equal(transport.destroyed, false);
});

test("upgrade: bytes received after the switch reach the tunnel", async () => {
  const handler: Handler = async () => switchTo(echo);
  const { connection, transport, send } = openConnection(handler);

  send("GET /chat HTTP/1.1\r\nConnection: upgrade\r\nUpgrade: echo\r\n\r\n");
  await within(waitFor(() => connection.state === "upgraded"));
  send("a");
  send("b");
  connection.receiveEnd();
  await within(connection.closed);

  assert.equal(transport.text(), `${SWITCHING}ab`);
});

test("upgrade: CONNECT 2xx opens a raw tunnel", async () => {
  const handler: Handler = async () => ({
    status: 200,
    upgrade: async (tunnel, head) => {
      const first = await tunnel.read();
      await tunnel.write(`${head.target} ${first?.toString() ?? ""}`);
    },
  });
  const { output, connection } = await injectRequests(
    handler,
    "CONNECT db.test:5432 HTTP/1.1\r\nHost: db.test:5432\r\n\r\nping",
  );

  assert.equal(output.toString("latin1"), "HTTP/1.1 200 OK\r\n\r\ndb.test:5432 ping");
  assert.equal(connection.state, "closed");
});

test("upgrade: 101 without a callback becomes a 500", async () => {
  const handler: Handler = async () => ({ status: 101, headers: { upgrade: "echo" } });
  const { output } = await injectRequests(
    handler,
    "GET /chat HTTP/1.1\r\nConnection: upgrade\r\nUpgrade: echo\r\n\r\n",
  );
  assert.equal(
    output.toString("latin1"),
    "HTTP/1.1 500 Internal Server Error\r\ncontent-type: text/plain; charset=utf-8\r\ncontent-length: 22\r\nconnection: close\r\n\r\nInternal Server Error\n",
  );
});

test("upgrade: a declined upgrade keeps speaking HTTP", async () => {
  const handler: Handler = async (request) => ({
    status: 200,
    body: request.head.target === "/chat" ? "no" : "next",
  });
  const { output } = await injectRequests(
    handler,
    "GET /chat HTTP/1.1\r\nConnection: upgrade\r\nUpgrade: echo\r\n\r\nGET /after HTTP/1.1\r\n\r\n",
  );
  assert.equal(
    output.toString("latin1"),
    "HTTP/1.1 200 OK\r\ncontent-length: 2\r\n\r\nno" +
      "HTTP/1.1 200 OK\r\ncontent-length: 4\r\nconnection: close\r\n\r\nnext",
  );
});

test("upgrade: a failing callback aborts the connection", async () => {
  const handler: Handler = async () =>
    switchTo(async () => {
      throw new Error("tunnel broke");
    });
  const { connection, transport, send } = openConnection(handler);
  const closeErrors: Array<Error | undefined> = [];
  connection.on("close", (err?: Error) => closeErrors.push(err));

  send("GET /chat HTTP/1.1\r\nConnection: upgrade\r\nUpgrade: echo\r\n\r\n");
  await within(connection.closed);

  assert.equal(transport.destroyed, true);
  assert.equal(transport.text(), SWITCHING);
  assert.equal(closeErrors[0]?.message, "tunnel broke");
});
