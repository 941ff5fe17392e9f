import { BoundsError, FormatError } from "../errors";
import { bigIntFromBytesLE, bytesToHex, detectCurveFromPrime } from "../field";
import { silentLogger, type Logger } from "../logger";
import { BinaryReader } from "./reader";
import {
  DEFAULT_LIMITS,
  R1CS_MAGIC,
  R1csSectionType,
  SUPPORTED_VERSIONS,
  type DecodeLimits,
  type FileHeader,
  type R1csLayout,
} from "./types";

export interface HeaderDecodeOptions {
  layout?: R1csLayout;
  limits?: Partial<DecodeLimits>;
  logger?: Logger;
}

/** Byte range of the constraint blocks; `size` is known for sectioned containers only */
export interface ConstraintRegion {
  position: number;
  size?: number;
}

export interface HeaderDecodeResult {
  header: FileHeader;
  constraints: ConstraintRegion;
}

interface SectionEntry {
  type: number;
  size: number;
  position: number;
}

/** Fixed part of the sectioned header body, excluding the prime */
const SECTIONED_HEADER_FIXED_SIZE = 4 + 4 * 4 + 8 + 4;

/**
 * Decode and validate the header of an R1CS container. The magic tag is
 * checked before anything else is read.
 */
export function decodeHeader(
  reader: BinaryReader,
  options: HeaderDecodeOptions = {},
): HeaderDecodeResult {
  const layout = options.layout ?? "sectioned";
  const limits = { ...DEFAULT_LIMITS, ...options.limits };
  const logger = options.logger ?? silentLogger;

  reader.seek(0);
  const magic = reader.readBytes(4, "magic tag").slice();
  if (!magic.every((b, i) => b === R1CS_MAGIC[i])) {
    throw new FormatError(`invalid R1CS magic tag 0x${bytesToHex(magic)}`, {
      expected: bytesToHex(R1CS_MAGIC),
      actual: bytesToHex(magic),
    });
  }

  const version = reader.readU32("version");
  if (!SUPPORTED_VERSIONS.includes(version)) {
    throw new FormatError(`unsupported R1CS version ${version}`, { version });
  }

  const result =
    layout === "sectioned"
      ? decodeSectionedHeader(reader, magic, version, limits, logger)
      : decodeFlatHeader(reader, magic, version, limits);

  validateHeader(result.header, limits);
  logger.debug(
    `r1cs header: layout=${layout} n8=${result.header.fieldElementSize} wires=${result.header.totalWireCount} ` +
      `public=${result.header.publicInputCount} private=${result.header.privateInputCount} ` +
      `constraints=${result.header.constraintCount}`,
  );
  return result;
}

/**
 * Structural invariants every header must satisfy, whatever its layout.
 * Violations are reported, never corrected.
 */
export function validateHeader(
  header: FileHeader,
  limits: DecodeLimits = DEFAULT_LIMITS,
): void {
  const {
    fieldElementSize,
    totalWireCount,
    publicInputCount,
    privateInputCount,
  } = header;

  if (fieldElementSize < 1 || fieldElementSize > limits.maxFieldElementSize) {
    throw new BoundsError(
      `field element size ${fieldElementSize} outside 1..${limits.maxFieldElementSize}`,
      { fieldElementSize },
    );
  }
  if (totalWireCount < 1) {
    throw new BoundsError("circuit has no wires; wire 0 must be the constant one", {
      totalWireCount,
    });
  }
  if (publicInputCount > totalWireCount) {
    throw new BoundsError(
      `public input count ${publicInputCount} exceeds wire count ${totalWireCount}`,
      { publicInputCount, totalWireCount },
    );
  }
  if (publicInputCount + privateInputCount !== totalWireCount - 1) {
    throw new BoundsError(
      `public (${publicInputCount}) + private (${privateInputCount}) inputs must equal wires - 1 (${totalWireCount - 1})`,
      { publicInputCount, privateInputCount, totalWireCount },
    );
  }
}

function decodeSectionedHeader(
  reader: BinaryReader,
  magic: Uint8Array,
  version: number,
  limits: DecodeLimits,
  logger: Logger,
): HeaderDecodeResult {
  const sectionCount = reader.readU32("section count");
  const sections = new Map<number, SectionEntry>();

  for (let i = 0; i < sectionCount; i++) {
    const type = reader.readU32(`section ${i} type`);
    const declared = reader.readU64(`section ${i} size`);
    if (declared > BigInt(reader.remaining)) {
      throw new FormatError(
        `section ${i} (type ${type}) declares ${declared} bytes but only ${reader.remaining} remain`,
        { section: i, type, declared, remaining: reader.remaining },
      );
    }
    const size = Number(declared);
    const isKnown = type === R1csSectionType.Header || type === R1csSectionType.Constraints;

    if (sections.has(type)) {
      if (isKnown) {
        throw new FormatError(`duplicate section of type ${type}`, { type });
      }
    } else {
      sections.set(type, { type, size, position: reader.position });
    }
    if (!isKnown) {
      logger.debug(`skipping section type ${type} (${size} bytes)`);
    }
    reader.skip(size);
  }

  const headerSection = sections.get(R1csSectionType.Header);
  if (!headerSection) {
    throw new FormatError("missing header section");
  }
  const constraintSection = sections.get(R1csSectionType.Constraints);
  if (!constraintSection) {
    throw new FormatError("missing constraint section");
  }

  reader.seek(headerSection.position);
  const fieldElementSize = reader.readU32("field element size");
  if (fieldElementSize < 1 || fieldElementSize > limits.maxFieldElementSize) {
    throw new BoundsError(
      `field element size ${fieldElementSize} outside 1..${limits.maxFieldElementSize}`,
      { fieldElementSize },
    );
  }
  if (headerSection.size !== SECTIONED_HEADER_FIXED_SIZE + fieldElementSize) {
    throw new FormatError(
      `header section is ${headerSection.size} bytes, expected ${SECTIONED_HEADER_FIXED_SIZE + fieldElementSize}`,
      { size: headerSection.size, fieldElementSize },
    );
  }

  const prime = bigIntFromBytesLE(reader.readBytes(fieldElementSize, "prime"));
  const totalWireCount = reader.readU32("wire count");
  const outputCount = reader.readU32("public output count");
  const publicOnlyInputs = reader.readU32("public input count");
  const privateInputSignalCount = reader.readU32("private input count");
  const labelCount = reader.readU64("label count");
  const constraintCount = reader.readU32("constraint count");

  const publicInputCount = outputCount + publicOnlyInputs;
  if (totalWireCount < 1 || publicInputCount > totalWireCount - 1) {
    throw new BoundsError(
      `public signals (${publicInputCount}) do not fit in ${totalWireCount} wires`,
      { publicInputCount, totalWireCount },
    );
  }
  if (publicInputCount + privateInputSignalCount > totalWireCount - 1) {
    throw new BoundsError(
      `signals (${publicInputCount} public, ${privateInputSignalCount} private) exceed ${totalWireCount - 1} non-constant wires`,
      { publicInputCount, privateInputSignalCount, totalWireCount },
    );
  }

  return {
    header: {
      magic,
      version,
      layout: "sectioned",
      fieldElementSize,
      totalWireCount,
      publicInputCount,
      privateInputCount: totalWireCount - 1 - publicInputCount,
      constraintCount,
      prime,
      curve: detectCurveFromPrime(prime),
      outputCount,
      privateInputSignalCount,
      labelCount,
    },
    constraints: { position: constraintSection.position, size: constraintSection.size },
  };
}

function decodeFlatHeader(
  reader: BinaryReader,
  magic: Uint8Array,
  version: number,
  limits: DecodeLimits,
): HeaderDecodeResult {
  const fieldSizeWords = reader.readU32("field size");
  const totalWireCount = reader.readU32("wire count");
  const publicInputCount = reader.readU32("public input count");
  const privateInputCount = reader.readU32("private input count");
  const constraintCount = reader.readU32("constraint count");

  // flat containers count the element size in 64-bit words
  const fieldElementSize = fieldSizeWords * 8;
  if (fieldSizeWords < 1 || fieldElementSize > limits.maxFieldElementSize) {
    throw new BoundsError(
      `field size of ${fieldSizeWords} words outside 1..${Math.floor(limits.maxFieldElementSize / 8)}`,
      { fieldSizeWords },
    );
  }

  return {
    header: {
      magic,
      version,
      layout: "flat",
      fieldElementSize,
      totalWireCount,
      publicInputCount,
      privateInputCount,
      constraintCount,
      curve: "unknown",
    },
    constraints: { position: reader.position },
  };
}
