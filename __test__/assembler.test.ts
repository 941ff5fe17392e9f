import { beforeAll, describe, it, expect } from "vitest";
import {
  DIP69_MODE0,
  FormatError,
  OP_CHECKZKP,
  SerializationSizeError,
  assembleScript,
  bytesToHex,
  disassembleScript,
  encodePush,
  loadBls12381,
  packageProof,
  pushSequence,
  scriptToAsm,
  type StackItem,
} from "../src";
import { NEG_G1, PROOF, leHex, verifyingKey } from "./fixtures";

const filled = (length: number) => new Uint8Array(length).fill(0xab);

describe("encodePush", () => {
  it("uses OP_0 for empty and single zero-byte items", () => {
    expect(encodePush(new Uint8Array(0))).toEqual(Uint8Array.of(0x00));
    expect(encodePush(Uint8Array.of(0x00))).toEqual(Uint8Array.of(0x00));
    expect(encodePush(Uint8Array.of(0x01))).toEqual(Uint8Array.of(0x01, 0x01));
  });

  it("pushes up to 75 bytes directly", () => {
    const push = encodePush(filled(75));

    expect(push.length).toBe(76);
    expect(push[0]).toBe(0x4b);
  });

  it("switches to OP_PUSHDATA1 at 76 bytes", () => {
    const push = encodePush(filled(76));

    expect(push.length).toBe(78);
    expect([push[0], push[1]]).toEqual([0x4c, 76]);
    expect(encodePush(filled(255)).subarray(0, 2)).toEqual(Uint8Array.of(0x4c, 0xff));
  });

  it("switches to OP_PUSHDATA2 at 256 bytes with a little-endian length", () => {
    expect(encodePush(filled(256)).subarray(0, 3)).toEqual(Uint8Array.of(0x4d, 0x00, 0x01));
    expect(encodePush(filled(65535)).subarray(0, 3)).toEqual(Uint8Array.of(0x4d, 0xff, 0xff));
  });

  it("rejects items above 65535 bytes", () => {
    expect(() => encodePush(filled(65536))).toThrow(SerializationSizeError);
  });
});

describe("assembleScript", () => {
  let items: StackItem[];
  let script: Uint8Array;

  beforeAll(async () => {
    const curve = await loadBls12381();
    items = packageProof(PROOF, verifyingKey(2), [7n], curve);
    script = assembleScript(items);
    await curve.terminate();
  });

  it("pushes items in reverse and ends with OP_CHECKZKP", () => {
    expect(script.length).toBe(8 * 49 + 33 + 6 * 82 + 1 + 1);
    expect(script[0]).toBe(48);
    expect(bytesToHex(script.subarray(1, 49))).toBe(leHex(NEG_G1.y, 48));
    expect([script[392], script[393]]).toEqual([0x20, 0x07]);
    expect([script[835], script[836]]).toEqual([0x4c, 80]);
    expect([script[917], script[918]]).toEqual([0x00, OP_CHECKZKP]);
  });

  it("pushes in packaging order for forward profiles", () => {
    const forward = { ...DIP69_MODE0, pushOrder: "forward" as const };

    expect(pushSequence(items, forward)[0]).toEqual(Uint8Array.of(0x00));
    expect(assembleScript(items, forward)[0]).toBe(0x00);
  });

  it("disassembles back to the packaged items", () => {
    const { pushes, terminalOpcode } = disassembleScript(script);

    expect(terminalOpcode).toBe(OP_CHECKZKP);
    expect(pushes.reverse()).toEqual([new Uint8Array(0), ...items.slice(1)]);
  });
});

describe("disassembleScript", () => {
  it("rejects truncated pushes", () => {
    expect(() => disassembleScript(Uint8Array.of(0x05, 0x01, 0xb9))).toThrow(FormatError);
  });

  it("rejects a script without a terminal opcode", () => {
    expect(() => disassembleScript(Uint8Array.of(0x01, 0xaa))).toThrow(
      "script has no terminal opcode",
    );
  });

  it("rejects opcodes other than pushes before the end", () => {
    expect(() => disassembleScript(Uint8Array.of(0x4e, 0xb9))).toThrow(
      "unexpected opcode 0x4e at offset 0",
    );
  });

  it("renders a script as text", () => {
    expect(scriptToAsm(Uint8Array.of(0x02, 0x0a, 0x0b, 0x00, 0xb9))).toBe("0a0b OP_0 OP_CHECKZKP");
  });
});
