import { describe, expect, it } from "vitest";

import { MessageParseError } from "../errors.js";
import {
  decodeCommand,
  decodeServerLine,
  encodeCommand,
  encodePowerUp,
  parseInteger,
} from "../protocol.js";

describe("decodeServerLine", () => {
  it("treats a bare integer as a world size", () => {
    expect(decodeServerLine("40")).toEqual({ kind: "worldSize", size: 40 });
    expect(decodeServerLine(" 2000 ")).toEqual({ kind: "worldSize", size: 2000 });
  });

  it("fills snake defaults for fields the server left out", () => {
    const message = decodeServerLine('{"snake":{"SnakeId":7,"Score":0}}');

    expect(message).toEqual({
      kind: "snake",
      snake: {
        SnakeId: 7,
        Name: "",
        Body: [],
        Direction: { X: 0, Y: 0 },
        Score: 0,
        Died: false,
        Alive: true,
        Disconnected: false,
        Joined: false,
      },
    });
  });

  it("decodes walls and power-ups", () => {
    expect(decodeServerLine('{"wall":{"WallId":2,"P1":{"X":-5,"Y":0},"P2":{"X":5,"Y":0}}}')).toEqual({
      kind: "wall",
      wall: { WallId: 2, P1: { X: -5, Y: 0 }, P2: { X: 5, Y: 0 } },
    });
    expect(decodeServerLine('{"power":{"PowerId":3,"IsActive":true,"Location":{"X":1,"Y":2}}}')).toEqual({
      kind: "power",
      power: { PowerId: 3, IsActive: true, Location: { X: 1, Y: 2 } },
    });
  });

  it("routes by the first matching tag when several are present", () => {
    const message = decodeServerLine('{"power":{"PowerId":1},"snake":{"SnakeId":4,"Score":9}}');

    expect(message.kind).toBe("snake");
  });

  it("ignores text and objects that carry no known tag", () => {
    expect(decodeServerLine("hello")).toEqual({ kind: "ignored" });
    expect(decodeServerLine('{"moving":"up"}')).toEqual({ kind: "ignored" });
    expect(decodeServerLine("[1,2]")).toEqual({ kind: "ignored" });
  });

  it("throws MessageParseError for broken JSON", () => {
    expect(() => decodeServerLine("{not json")).toThrow(MessageParseError);
  });

  it("names the field when a tagged record has the wrong shape", () => {
    let caught: unknown;
    try {
      decodeServerLine('{"snake":{"SnakeId":"seven","Score":0}}');
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(MessageParseError);
    expect(caught instanceof MessageParseError && caught.message).toBe(
      'malformed message (bad snake record at SnakeId: Expected number, received string): {"snake":{"SnakeId":"seven","Score":0}}',
    );
  });
});

describe("parseInteger", () => {
  it("accepts signed integers and rejects everything else", () => {
    expect(parseInteger("+7")).toBe(7);
    expect(parseInteger("-3")).toBe(-3);
    expect(parseInteger("7.5")).toBeNull();
    expect(parseInteger("")).toBeNull();
    expect(parseInteger("abc")).toBeNull();
    expect(parseInteger("99999999999999999999")).toBeNull();
  });
});

describe("commands", () => {
  it("encodes a direction as a moving object", () => {
    expect(encodeCommand("left")).toBe('{"moving":"left"}');
  });

  it("decodes only known directions", () => {
    expect(decodeCommand('{"moving":"down"}')).toBe("down");
    expect(decodeCommand('{"moving":"sideways"}')).toBeNull();
    expect(decodeCommand("down")).toBeNull();
  });
});

describe("encoders", () => {
  it("wraps records under their tag", () => {
    expect(encodePowerUp({ PowerId: 1, Location: { X: 0, Y: 0 }, IsActive: false })).toBe(
      '{"power":{"PowerId":1,"Location":{"X":0,"Y":0},"IsActive":false}}',
    );
  });
});
