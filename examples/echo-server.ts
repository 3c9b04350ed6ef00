/**
 * Echo server showing the handler API.
 *
 * Run with: npm run example:echo
 *
 *   curl -v http://127.0.0.1:8080/
 *   curl -v --data-binary @README.md http://127.0.0.1:8080/echo
 *   curl -v -H 'Expect: 100-continue' --data 'hi' http://127.0.0.1:8080/echo
 */

import { createServer, readText, type Handler } from "../src/index.ts";

const handler: Handler = async (request) => {
  const { head } = request;

  if (head.target === "/echo" && head.method === "POST") {
    // reading the body is what sends 100 Continue
    return {
      status: 200,
      headers: { "content-type": head.headers.text("content-type") ?? "application/octet-stream" },
      body: request.body,
    };
  }

  if (head.target === "/text" && head.method === "POST") {
    const text = await readText(request, { limit: 4096, mimeType: "text/*" });
    return { status: 200, headers: { "content-type": "text/plain" }, body: text.toUpperCase() };
  }

  if (head.target === "/stream") {
    async function* ticks() {
      for (let i = 1; i <= 3; i++) {
        yield `tick ${i}\n`;
        await new Promise((resolve) => setTimeout(resolve, 200));
      }
    }
    return { status: 200, headers: { "content-type": "text/plain" }, body: ticks() };
  }

  return {
    status: 200,
    headers: { "content-type": "text/plain" },
    body: `${head.method} ${head.target} ${head.version}\n`,
  };
};

async function main() {
  const server = createServer(handler, { debug: ["server"], compressResponses: true });
  server.on("log", (line: string) => console.log(line));

  const address = await server.listen(Number(process.env.PORT ?? 8080));
  console.log(`listening on http://${address.address}:${address.port}`);

  process.once("SIGINT", () => {
    console.log("\nshutting down");
    server.close().catch((err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    });
  });
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
