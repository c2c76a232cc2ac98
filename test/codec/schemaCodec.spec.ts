// test/codec/schemaCodec.spec.ts
// Tests for the model-driven codec: flags, unions, bare types, vectors

import { describe, it, expect } from "vitest";
import { gzipSync } from "node:zlib";
import { EncodeError, SchemaCodec, flagsValue } from "../../src/codec/schemaCodec";
import { BinaryReader, BinaryWriter, GZIP_PACKED_ID, UnknownConstructorError, VECTOR_ID } from "../../src/runtime";
import { compileApi, thrownBy } from "../helpers/fixtures";

const model = compileApi();
const codec = new SchemaCodec(model);

describe("SchemaCodec", () => {
  describe("Flags", () => {
    it("should round-trip with every optional field unset", () => {
      const data = codec.encode({ _: "sample.flagged" });
      expect(Array.from(data)).toEqual([0xbc, 0xaa, 0xac, 0x42, 0, 0, 0, 0]);
      expect(codec.decode(data)).toEqual({ _: "sample.flagged" });
    });

    it("should round-trip with every optional field set", () => {
      const value = { _: "sample.flagged", a: 5, b: "hi" };
      const data = codec.encode(value);
      const r = new BinaryReader(data);
      expect(r.uint()).toBe(0x42acaabc);
      expect(r.uint()).toBe(3);
      expect(r.int()).toBe(5);
      expect(r.string()).toBe("hi");
      expect(r.remaining).toBe(0);
      expect(codec.decode(data)).toEqual(value);
    });

    it("should write only the fields whose bit is set", () => {
      const data = codec.encode({ _: "sample.flagged", b: "x" });
      expect(data.length).toBe(12);
      expect(new BinaryReader(data.slice(4)).uint()).toBe(2);
      expect(codec.decode(data)).toEqual({ _: "sample.flagged", b: "x" });
    });

    it("should carry true-flags in the bitmask only", () => {
      const message = model.constructorsByName.get("message");
      if (!message) throw new Error("fixture has no message constructor");
      expect(flagsValue(message, "flags", { _: "message", out: true, reply_to: 3 })).toBe(10);
      expect(flagsValue(message, "flags", { _: "message", out: false })).toBe(0);
    });

    it("should decode an unset true-flag as false", () => {
      const data = codec.encode({ _: "message", id: 1, peer_id: { _: "peerChat", chat_id: 9n }, message: "" });
      expect(codec.decode(data)).toEqual({
        _: "message",
        out: false,
        id: 1,
        peer_id: { _: "peerChat", chat_id: 9n },
        message: "",
      });
    });
  });

  describe("Nested values", () => {
    const message = {
      _: "message",
      out: true,
      id: 42,
      peer_id: { _: "peerUser", user_id: 1234567890123n },
      reply_to: 41,
      message: "hello",
      entities: [
        { _: "messageEntityBold", offset: 0, length: 5 },
        { _: "messageEntityUrl", offset: 0, length: 5, url: "https://example.test" },
      ],
    };

    it("should round-trip unions and vectors of unions", () => {
      expect(codec.decode(codec.encode(message))).toEqual(message);
    });

    it("should round-trip vectors of 0, 1 and N boxed elements", () => {
      for (const count of [0, 1, 3]) {
        const value = {
          _: "messages.messages",
          messages: Array.from({ length: count }, (_, i) => ({ _: "messageEmpty", id: i })),
          count,
        };
        expect(codec.decode(codec.encode(value))).toEqual(value);
      }
    });

    it("should round-trip bare constructors and bare vectors", () => {
      const value = {
        _: "sample.pair",
        first: {
          _: "sample.numbers",
          small: -1,
          big: -(2n ** 63n),
          huge: 2n ** 100n,
          ratio: 0.25,
          blob: new Uint8Array([1, 2, 3, 4, 5]),
          yes: true,
        },
        ids: [1n, 2n],
      };
      const data = codec.encode(value);
      // id, then the bare numbers (4 + 8 + 16 + 8 + 8 + 4), then count + 2 longs
      expect(data.length).toBe(4 + 48 + 4 + 16);
      expect(codec.decode(data)).toEqual(value);
    });

    it("should decode bare values by name", () => {
      const bare = codec.encodeBare({ _: "pong", msg_id: 1n, ping_id: 2n });
      expect(bare.length).toBe(16);
      expect(codec.decodeBare(bare, "pong")).toEqual({ _: "pong", msg_id: 1n, ping_id: 2n });
    });

    it("should encode function calls and decode their results", () => {
      const call = codec.encode({ _: "ping", ping_id: 7n });
      expect(new BinaryReader(call).uint()).toBe(0x7abe77ec);

      const answer = codec.encode({ _: "pong", msg_id: 1n, ping_id: 7n });
      expect(codec.decodeResult("ping", answer)).toEqual({ _: "pong", msg_id: 1n, ping_id: 7n });
      expect(codec.decodeResult("invokeWithLayer", answer)).toEqual({ _: "pong", msg_id: 1n, ping_id: 7n });
    });

    it("should decode vector results", () => {
      const data = new BinaryWriter()
        .uint(VECTOR_ID)
        .int(2)
        .raw(codec.encode({ _: "messageEmpty", id: 1 }))
        .raw(codec.encode({ _: "messageEmpty", id: 2 }))
        .finish();
      expect(codec.decodeResult("messages.getMessages", data)).toEqual([
        { _: "messageEmpty", id: 1 },
        { _: "messageEmpty", id: 2 },
      ]);
    });

    it("should unwrap gzip_packed values", () => {
      const inner = codec.encode(message);
      const packed = new BinaryWriter().uint(GZIP_PACKED_ID).bytes(new Uint8Array(gzipSync(inner))).finish();
      expect(codec.decode(packed)).toEqual(message);
    });
  });

  describe("Unknown constructors", () => {
    it("should reject an id the schema does not know", () => {
      const err = thrownBy(() => codec.decode(new BinaryWriter().uint(0xdeadbeef).finish()));
      expect(err).toBeInstanceOf(UnknownConstructorError);
      if (err instanceof UnknownConstructorError) {
        expect(err.constructorId).toBe(0xdeadbeef);
        expect(err.offset).toBe(0);
      }
    });

    it("should report an unknown id inside gzip_packed at the envelope", () => {
      const stray = new BinaryWriter().uint(0xdeadbeef).finish();
      const data = new BinaryWriter()
        .uint(VECTOR_ID)
        .int(1)
        .uint(GZIP_PACKED_ID)
        .bytes(new Uint8Array(gzipSync(stray)))
        .finish();
      const err = thrownBy(() => codec.decodeResult("messages.getMessages", data));
      expect(err).toBeInstanceOf(UnknownConstructorError);
      if (err instanceof UnknownConstructorError) {
        expect(err.constructorId).toBe(0xdeadbeef);
        expect(err.expected).toBe("Message");
        expect(err.offset).toBe(8);
      }
    });

    it("should reject a known constructor of the wrong base type at its offset", () => {
      const data = new BinaryWriter().uint(VECTOR_ID).int(1).raw(codec.encode({ _: "peerUser", user_id: 1n })).finish();
      const err = thrownBy(() => codec.decodeResult("messages.getMessages", data));
      expect(err).toBeInstanceOf(UnknownConstructorError);
      if (err instanceof UnknownConstructorError) {
        expect(err.expected).toBe("Message");
        expect(err.offset).toBe(8);
        expect(err.constructorId).toBe(0x59511722);
      }
    });
  });

  describe("Encode errors", () => {
    it("should reject a constructor of another base type", () => {
      expect(() =>
        codec.encode({ _: "message", id: 1, peer_id: { _: "inputPeerEmpty" }, message: "" })
      ).toThrow("EncodeError: inputPeerEmpty is not a constructor of Peer at message.peer_id");
    });

    it("should reject values of the wrong primitive type", () => {
      expect(() => codec.encode({ _: "pong", msg_id: 1, ping_id: 2n })).toThrow(
        "EncodeError: expected bigint at pong.msg_id"
      );
    });

    it("should reject a bare value with the wrong constructor", () => {
      expect(() => codec.encode({ _: "sample.pair", first: { _: "sample.flagged" }, ids: [] })).toThrow(EncodeError);
    });

    it("should reject unknown names", () => {
      expect(() => codec.encode({ _: "nope" })).toThrow("EncodeError: unknown constructor nope at nope");
      expect(() => codec.decodeResult("nope", new Uint8Array())).toThrow(EncodeError);
    });
  });
});
