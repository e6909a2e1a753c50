import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { LineConnection } from "../connection.js";
import { ConnectError, MessageFramingError, NotConnectedError, ReadError } from "../errors.js";
import { closedPort, startLoopback, type Loopback } from "./helpers/loopback.js";

describe("LineConnection", () => {
  let loopback: Loopback;
  let client: LineConnection;

  beforeEach(async () => {
    loopback = await startLoopback();
    client = new LineConnection();
  });

  afterEach(async () => {
    client.disconnect();
    await loopback.close();
  });

  async function connectPair(): Promise<LineConnection> {
    const result = await client.connect("127.0.0.1", loopback.port);
    expect(result).toEqual({ ok: true });
    return LineConnection.fromSocket(await loopback.nextSocket());
  }

  it("delivers sent lines to the peer in order without terminators", async () => {
    const peer = await connectPair();
    const lines = ["alpha", "{\"moving\":\"up\"}", "gamma δ ✓", "42"];

    await Promise.all(lines.map((line) => client.send(line)));

    const received: string[] = [];
    for (let i = 0; i < lines.length; i++) received.push(await peer.readLine());
    expect(received).toEqual(lines);
    peer.disconnect();
  });

  it("reassembles lines split across writes, including inside a UTF-8 sequence", async () => {
    await client.connect("127.0.0.1", loopback.port);
    const raw = await loopback.nextSocket();
    const bytes = Buffer.from("héllo\r\nwor", "utf8");

    raw.write(bytes.subarray(0, 2));
    raw.write(bytes.subarray(2));
    raw.write("ld\n");

    expect(await client.readLine()).toBe("héllo");
    expect(await client.readLine()).toBe("world");
  });

  it("returns an unterminated tail, then an empty string once the peer has closed", async () => {
    await client.connect("127.0.0.1", loopback.port);
    const raw = await loopback.nextSocket();

    raw.end("last");

    expect(await client.readLine()).toBe("last");
    expect(await client.readLine()).toBe("");
    expect(client.isConnected()).toBe(false);
  });

  it("reports an empty line as an empty string while staying connected", async () => {
    await client.connect("127.0.0.1", loopback.port);
    const raw = await loopback.nextSocket();

    raw.write("\nnext\n");

    expect(await client.readLine()).toBe("");
    expect(client.isConnected()).toBe(true);
    expect(await client.readLine()).toBe("next");
  });

  it("rejects pending reads with a ReadError when the socket fails", async () => {
    await client.connect("127.0.0.1", loopback.port);
    const socket = await loopback.nextSocket();
    const server = LineConnection.fromSocket(socket);

    const pending = server.readLine();
    socket.destroy(new Error("boom"));

    await expect(pending).rejects.toBeInstanceOf(ReadError);
    expect(server.isConnected()).toBe(false);
  });

  it("refuses to send a message containing a line break", async () => {
    await connectPair();

    await expect(client.send("two\nlines")).rejects.toBeInstanceOf(MessageFramingError);
    await expect(client.send("carriage\rreturn")).rejects.toBeInstanceOf(MessageFramingError);
  });

  it("disconnects idempotently, before and after connecting", async () => {
    const fresh = new LineConnection();
    expect(() => fresh.disconnect()).not.toThrow();
    expect(() => fresh.disconnect()).not.toThrow();
    expect(fresh.isConnected()).toBe(false);

    await connectPair();
    expect(client.isConnected()).toBe(true);
    client.disconnect();
    client.disconnect();
    expect(client.isConnected()).toBe(false);
  });

  it("lets the peer observe a disconnect as end of stream", async () => {
    const peer = await connectPair();

    client.disconnect();

    expect(await peer.readLine()).toBe("");
    expect(peer.isConnected()).toBe(false);
  });

  it("reports a refused connection and stays unusable", async () => {
    const port = await closedPort();

    const result = await client.connect("127.0.0.1", port);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ConnectError);
    expect(result.error.reason).toBe("refused");
    expect(result.error.message).toBe(`could not connect to 127.0.0.1:${port} (refused)`);
    expect(client.isConnected()).toBe(false);
    await expect(client.send("hello")).rejects.toBeInstanceOf(NotConnectedError);
    await expect(client.readLine()).rejects.toBeInstanceOf(NotConnectedError);
  });

  it("releases the connection when a scoped handler throws", async () => {
    const peer = await connectPair();

    await expect(
      LineConnection.use(peer, () => {
        throw new Error("handler failed");
      }),
    ).rejects.toThrow("handler failed");

    expect(peer.isConnected()).toBe(false);
    expect(await client.readLine()).toBe("");
  });

  it("abandons a connect that is still in flight when disconnected", async () => {
    const connecting = client.connect("127.0.0.1", loopback.port);
    client.disconnect();

    const result = await connecting;

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.reason).toBe("aborted");
    expect(client.isConnected()).toBe(false);
  });
});
