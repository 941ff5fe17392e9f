import { FormatError, SerializationSizeError } from "../errors";
import { bytesToHex } from "../field";
import type { StackItem } from "../proof/packager";
import { DIP69_MODE0, OP_CHECKZKP, type ProtocolProfile } from "../protocol";
import {
  MAX_DIRECT_PUSH,
  MAX_PUSHDATA2,
  OP_0,
  OP_PUSHDATA1,
  OP_PUSHDATA2,
} from "./opcodes";

/** Minimal push operation for one item */
export function encodePush(item: StackItem): Uint8Array {
  const length = item.length;
  if (length === 0 || (length === 1 && item[0] === 0)) {
    return Uint8Array.of(OP_0);
  }
  if (length <= MAX_DIRECT_PUSH) {
    return Uint8Array.from([length, ...item]);
  }
  if (length <= 0xff) {
    return Uint8Array.from([OP_PUSHDATA1, length, ...item]);
  }
  if (length <= MAX_PUSHDATA2) {
    return Uint8Array.from([OP_PUSHDATA2, length & 0xff, length >> 8, ...item]);
  }
  throw new SerializationSizeError(`stack item of ${length} bytes exceeds OP_PUSHDATA2`, {
    length,
  });
}

/** Items in the order the script pushes them */
export function pushSequence(
  items: readonly StackItem[],
  profile: ProtocolProfile = DIP69_MODE0,
): StackItem[] {
  return profile.pushOrder === "reverse" ? [...items].reverse() : [...items];
}

/** One push per item in the profile's push order, then the terminal opcode */
export function assembleScript(
  items: readonly StackItem[],
  profile: ProtocolProfile = DIP69_MODE0,
): Uint8Array {
  const parts = pushSequence(items, profile).map(encodePush);
  parts.push(Uint8Array.of(profile.terminalOpcode));
  return new Uint8Array(Buffer.concat(parts));
}

export interface DisassembledScript {
  /** Pushed data in script order; `OP_0` yields an empty item */
  pushes: StackItem[];
  terminalOpcode: number;
}

/** Inverse of `assembleScript` up to push order */
export function disassembleScript(script: Uint8Array): DisassembledScript {
  const pushes: StackItem[] = [];
  let offset = 0;

  const take = (count: number, what: string): Uint8Array => {
    if (offset + count > script.length) {
      throw new FormatError(`truncated ${what} at offset ${offset}`, { offset, needed: count });
    }
    const out = script.slice(offset, offset + count);
    offset += count;
    return out;
  };

  while (offset < script.length) {
    const opcode = script[offset] ?? 0;
    if (offset === script.length - 1 && opcode > OP_PUSHDATA2) {
      return { pushes, terminalOpcode: opcode };
    }
    offset++;
    if (opcode === OP_0) {
      pushes.push(new Uint8Array(0));
    } else if (opcode <= MAX_DIRECT_PUSH) {
      pushes.push(take(opcode, "push"));
    } else if (opcode === OP_PUSHDATA1) {
      const [length = 0] = take(1, "OP_PUSHDATA1 length");
      pushes.push(take(length, "OP_PUSHDATA1 data"));
    } else if (opcode === OP_PUSHDATA2) {
      const [lo = 0, hi = 0] = take(2, "OP_PUSHDATA2 length");
      pushes.push(take(lo | (hi << 8), "OP_PUSHDATA2 data"));
    } else {
      throw new FormatError(`unexpected opcode 0x${opcode.toString(16)} at offset ${offset - 1}`);
    }
  }
  throw new FormatError("script has no terminal opcode");
}

/** Space-separated pushes as hex, e.g. `0a0b OP_0 OP_CHECKZKP` */
export function scriptToAsm(script: Uint8Array): string {
  const { pushes, terminalOpcode } = disassembleScript(script);
  const words = pushes.map((p) => (p.length === 0 ? "OP_0" : bytesToHex(p)));
  words.push(
    terminalOpcode === OP_CHECKZKP ? "OP_CHECKZKP" : `0x${terminalOpcode.toString(16)}`,
  );
  return words.join(" ");
}
