import { FormatError } from "../errors";
import { bigIntToBytesBE, bigIntToBytesLE } from "../field";
import {
  COEFFICIENT_BYTE_ORDER,
  R1CS_MAGIC,
  R1csSectionType,
  type ByteOrder,
  type Constraint,
  type R1csFile,
  type SparseLinearCombination,
} from "./types";

export interface RawSection {
  type: number;
  body: Uint8Array;
}

export interface R1csEncodeOptions {
  /** Sections written ahead of the header and constraint sections */
  extraSections?: RawSection[];
  /** Write the constraint section before the header section */
  constraintsFirst?: boolean;
}

class ByteSink {
  private readonly parts: Uint8Array[] = [];

  u32(value: number): this {
    const b = new Uint8Array(4);
    new DataView(b.buffer).setUint32(0, value, true);
    return this.bytes(b);
  }

  u64(value: bigint): this {
    const b = new Uint8Array(8);
    new DataView(b.buffer).setBigUint64(0, value, true);
    return this.bytes(b);
  }

  bytes(value: Uint8Array): this {
    this.parts.push(value);
    return this;
  }

  toBytes(): Uint8Array {
    return new Uint8Array(Buffer.concat(this.parts));
  }
}

/**
 * Serialize an R1CS file in the layout its header names. Decoding the result
 * yields the same header fields, constraints and embedded witness.
 */
export function encodeR1cs(file: R1csFile, options: R1csEncodeOptions = {}): Uint8Array {
  const { header } = file;
  const order = COEFFICIENT_BYTE_ORDER[header.layout];
  const constraints = encodeConstraintBlocks(file.constraints, header.fieldElementSize, order);
  const out = new ByteSink().bytes(R1CS_MAGIC).u32(header.version);

  if (header.layout === "flat") {
    if (header.fieldElementSize % 8 !== 0) {
      throw new FormatError(
        `flat containers store whole 64-bit words; ${header.fieldElementSize} bytes is not one`,
      );
    }
    out
      .u32(header.fieldElementSize / 8)
      .u32(header.totalWireCount)
      .u32(header.publicInputCount)
      .u32(header.privateInputCount)
      .u32(header.constraintCount)
      .bytes(constraints);
    for (const value of file.embeddedWitness ?? []) {
      out.bytes(encodeElement(value, header.fieldElementSize, order));
    }
    return out.toBytes();
  }

  if (header.prime === undefined) {
    throw new FormatError("sectioned containers need the field prime");
  }
  const outputCount = header.outputCount ?? 0;
  const headerBody = new ByteSink()
    .u32(header.fieldElementSize)
    .bytes(bigIntToBytesLE(header.prime, header.fieldElementSize))
    .u32(header.totalWireCount)
    .u32(outputCount)
    .u32(header.publicInputCount - outputCount)
    .u32(header.privateInputSignalCount ?? 0)
    .u64(header.labelCount ?? 0n)
    .u32(header.constraintCount)
    .toBytes();

  const known: RawSection[] = [
    { type: R1csSectionType.Header, body: headerBody },
    { type: R1csSectionType.Constraints, body: constraints },
  ];
  if (options.constraintsFirst) known.reverse();
  const sections = [...(options.extraSections ?? []), ...known];

  out.u32(sections.length);
  for (const section of sections) {
    out.u32(section.type).u64(BigInt(section.body.length)).bytes(section.body);
  }
  return out.toBytes();
}

function encodeConstraintBlocks(
  constraints: Constraint[],
  size: number,
  order: ByteOrder,
): Uint8Array {
  const out = new ByteSink();
  const combination = (lc: SparseLinearCombination) => {
    out.u32(lc.length);
    for (const term of lc) {
      out.u32(term.wireIndex).bytes(encodeElement(term.coefficient, size, order));
    }
  };
  for (const constraint of constraints) {
    combination(constraint.a);
    combination(constraint.b);
    combination(constraint.c);
  }
  return out.toBytes();
}

function encodeElement(value: bigint, size: number, order: ByteOrder): Uint8Array {
  return order === "le" ? bigIntToBytesLE(value, size) : bigIntToBytesBE(value, size);
}
