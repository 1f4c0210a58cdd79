import { describe, expect, it, vi } from "vitest";
import type { ITcpSocket } from "../interfaces/socket.js";
import { silentLogger } from "../logging/logger.js";
import { InMemoryFileSystem } from "../testing/in-memory-filesystem.js";
import {
  InMemoryClient,
  InMemoryTcpSocket,
} from "../testing/in-memory-socket-factory.js";
import { decodeToString, fromString } from "../utils/buffer.js";
import {
  ConnectionSession,
  type ConnectionSessionOptions,
} from "./connection-session.js";
import type { RouteRule } from "./router.js";

const NOT_FOUND = "HTTP/1.1 404 Not Found\r\n\r\n";
const CREATED = "HTTP/1.1 201 Created\r\n\r\n";

function echoReply(text: string, connection: "keep-alive" | "close"): string {
  return `HTTP/1.1 200 OK\r\nContent-Type: text/plain\r\nContent-Length: ${text.length}\r\nConnection: ${connection}\r\n\r\n${text}`;
}

async function setup(
  overrides: Partial<ConnectionSessionOptions> = {},
  wrap: (socket: InMemoryTcpSocket) => ITcpSocket = (socket) => socket,
) {
  const fs = new InMemoryFileSystem();
  await fs.mkdir("/srv");
  const [clientSocket, serverSocket] = InMemoryTcpSocket.createPair();
  const client = new InMemoryClient(clientSocket);
  const session = new ConnectionSession({
    socket: wrap(serverSocket),
    context: { baseDir: "/srv", fs, logger: silentLogger() },
    readBufferSize: 4096,
    quiet: true,
    logger: silentLogger(),
    ...overrides,
  });
  const done = session.run();
  return { fs, client, serverSocket, session, done };
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("ConnectionSession", () => {
  it("answers two requests on one connection", async () => {
    const { client, serverSocket, session, done } = await setup();
    const first = echoReply("one", "keep-alive");
    const second = echoReply("two", "keep-alive");

    await client.send("GET /echo/one HTTP/1.1\r\nHost: local\r\n\r\n");
    await client.waitForBytes(first.length);
    await client.send("GET /echo/two HTTP/1.1\r\nHost: local\r\n\r\n");
    const received = await client.waitForBytes(first.length + second.length);

    expect(decodeToString(received)).toBe(first + second);
    expect(client.closed).toBe(false);

    client.close();
    await done;
    expect(session.state).toBe("closed");
    expect(serverSocket.closeCalls).toBe(1);
  });

  it("closes after replying to Connection: close", async () => {
    const { client, serverSocket, session, done } = await setup();

    await client.send(
      "GET /echo/bye HTTP/1.1\r\nConnection: close\r\n\r\n",
    );
    await done;

    expect(decodeToString(client.received())).toBe(echoReply("bye", "close"));
    expect(client.closed).toBe(true);
    expect(session.state).toBe("closed");
    expect(serverSocket.closeCalls).toBe(1);
  });

  it("waits for the rest of a body that arrives later", async () => {
    const { fs, client, session, done } = await setup();

    await client.send(
      "POST /files/partial.bin HTTP/1.1\r\nContent-Length: 10\r\nConnection: close\r\n\r\n1234",
    );
    await delay(20);
    expect(session.state).toBe("parsing");

    await client.send("567890");
    await done;

    expect(decodeToString(client.received())).toBe(CREATED);
    expect(decodeToString(await fs.readFile("/srv/partial.bin"))).toBe(
      "1234567890",
    );
  });

  it("reads a body larger than the read buffer", async () => {
    const { fs, client, done } = await setup({ readBufferSize: 64 });
    const body = "x".repeat(100);

    await client.send(
      `POST /files/big.bin HTTP/1.1\r\nContent-Length: 100\r\n\r\n${body}`,
    );
    await client.waitForBytes(CREATED.length);
    client.close();
    await done;

    expect(decodeToString(await fs.readFile("/srv/big.bin"))).toBe(body);
  });

  it("answers an unterminated head with 404 and keeps the connection", async () => {
    const { client, done } = await setup();

    await client.send("GET / HTTP/1.1\r\nHost: local\r\n");
    await client.waitForBytes(NOT_FOUND.length);
    await client.send("GET / HTTP/1.1\r\n\r\n");
    const received = await client.waitForBytes(NOT_FOUND.length + 19);

    expect(decodeToString(received)).toBe(
      `${NOT_FOUND}HTTP/1.1 200 OK\r\n\r\n`,
    );
    client.close();
    await done;
  });

  it("answers a bad Content-Length with 404 and closes", async () => {
    const { client, serverSocket, done } = await setup();

    await client.send(
      "POST /files/a.txt HTTP/1.1\r\nContent-Length: ten\r\n\r\nhello",
    );
    await done;

    expect(decodeToString(client.received())).toBe(NOT_FOUND);
    expect(client.closed).toBe(true);
    expect(serverSocket.closeCalls).toBe(1);
  });

  it("ends quietly when the peer leaves before sending anything", async () => {
    const { client, serverSocket, session, done } = await setup();

    client.close();
    await done;

    expect(session.state).toBe("closed");
    expect(serverSocket.closeCalls).toBe(1);
  });

  it("ends on a transport error", async () => {
    const logger = { ...silentLogger(), debug: vi.fn() };
    const { serverSocket, session, done } = await setup({ logger });

    serverSocket.fail(new Error("ECONNRESET"));
    await done;

    expect(session.state).toBe("closed");
    expect(serverSocket.closeCalls).toBe(1);
    expect(logger.debug).toHaveBeenCalledWith(
      "Read from in-memory:2 failed:",
      new Error("ECONNRESET"),
    );
  });

  it("closes once when a write fails", async () => {
    const { client, serverSocket, session, done } = await setup(
      {},
      (socket) => ({
        send: async () => {
          throw new Error("EPIPE");
        },
        onData: (cb) => socket.onData(cb),
        onEnd: (cb) => socket.onEnd(cb),
        onClose: (cb) => socket.onClose(cb),
        onError: (cb) => socket.onError(cb),
        close: () => socket.close(),
      }),
    );

    await client.send("GET /echo/lost HTTP/1.1\r\n\r\n");
    await done;

    expect(session.state).toBe("closed");
    expect(serverSocket.closeCalls).toBe(1);
    expect(client.received().length).toBe(0);
  });

  it("logs and closes when a handler throws", async () => {
    const logger = { ...silentLogger(), error: vi.fn() };
    const broken: RouteRule = {
      name: "broken",
      method: "GET",
      match: () => "",
      handle: async () => {
        throw new Error("handler exploded");
      },
    };
    const { client, serverSocket, done } = await setup({
      logger,
      routes: [broken],
    });

    await client.send("GET / HTTP/1.1\r\n\r\n");
    await done;

    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(serverSocket.closeCalls).toBe(1);
    expect(client.closed).toBe(true);
  });

  it("stops waiting once aborted", async () => {
    const { client, serverSocket, session, done } = await setup();

    session.abort();
    await done;

    expect(session.state).toBe("closed");
    expect(client.closed).toBe(true);
    expect(serverSocket.closeCalls).toBe(1);
  });

  it("gives up on an idle connection after the read deadline", async () => {
    const { client, done } = await setup({ readTimeoutMs: 20 });

    await done;
    expect(client.closed).toBe(true);
  });

  it("logs each request unless quiet", async () => {
    const logger = { ...silentLogger(), info: vi.fn() };
    const { client, done } = await setup({ logger, quiet: false });

    await client.send(
      "GET /user-agent HTTP/1.1\r\nConnection: close\r\n\r\n",
    );
    await done;

    expect(logger.info).toHaveBeenCalledWith("GET /user-agent - in-memory:2");
  });

  it("hands the body bytes through untouched", async () => {
    const { fs, client, done } = await setup();
    const payload = new Uint8Array([0x00, 0x0d, 0x0a, 0x0d, 0x0a, 0xff, 0x80]);
    const head = fromString(
      `POST /files/raw.bin HTTP/1.1\r\nContent-Length: ${payload.length}\r\nConnection: close\r\n\r\n`,
    );

    await client.send(head);
    await client.send(payload);
    await done;

    expect(Array.from(await fs.readFile("/srv/raw.bin"))).toEqual(
      Array.from(payload),
    );
  });
});
