import * as net from "node:net";
import { describe, expect, it } from "vitest";
import { NodeSocketFactory, NodeTcpSocket } from "./node-socket.js";

describe("NodeSocketFactory", () => {
  it("wraps Node sockets only", () => {
    const factory = new NodeSocketFactory();
    const socket = new net.Socket();

    expect(factory.wrapTcpSocket(socket)).toBeInstanceOf(NodeTcpSocket);
    expect(() => factory.wrapTcpSocket({})).toThrow(
      "Expected a Node net.Socket",
    );
    socket.destroy();
  });

  it("destroys a socket it is told to discard", () => {
    const factory = new NodeSocketFactory();
    const socket = new net.Socket();

    factory.discardTcpSocket(socket);

    expect(socket.destroyed).toBe(true);
  });
});

describe("NodeTcpSocket", () => {
  it("rejects sends once destroyed", async () => {
    const socket = new net.Socket();
    socket.destroy();

    await expect(
      new NodeTcpSocket(socket).send(new Uint8Array([1])),
    ).rejects.toThrow("Socket is not writable");
  });
});
