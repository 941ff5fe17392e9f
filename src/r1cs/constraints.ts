import { FormatError, OverflowGuardError } from "../errors";
import { bigIntFromBytesBE, bigIntFromBytesLE } from "../field";
import { silentLogger, type Logger } from "../logger";
import type { ConstraintRegion } from "./header";
import { BinaryReader } from "./reader";
import {
  COEFFICIENT_BYTE_ORDER,
  DEFAULT_LIMITS,
  type ByteOrder,
  type Constraint,
  type DecodeLimits,
  type FileHeader,
  type Matrix,
  type SparseLinearCombination,
} from "./types";

export interface ConstraintDecodeOptions {
  limits?: Partial<DecodeLimits>;
  logger?: Logger;
}

/** Three empty term counts */
const MIN_CONSTRAINT_SIZE = 3 * 4;

export function readFieldElement(
  reader: BinaryReader,
  size: number,
  order: ByteOrder,
  what = "field element",
): bigint {
  const bytes = reader.readBytes(size, what);
  return order === "le" ? bigIntFromBytesLE(bytes) : bigIntFromBytesBE(bytes);
}

/**
 * Read `header.constraintCount` constraints starting at `region.position`,
 * in file order. Counts are checked against the ceilings and against the
 * bytes actually available before anything is allocated from them.
 */
export function decodeConstraints(
  reader: BinaryReader,
  header: FileHeader,
  region: ConstraintRegion,
  options: ConstraintDecodeOptions = {},
): Constraint[] {
  const limits = { ...DEFAULT_LIMITS, ...options.limits };
  const logger = options.logger ?? silentLogger;
  const order = COEFFICIENT_BYTE_ORDER[header.layout];
  const end = region.size === undefined ? reader.length : region.position + region.size;
  const { constraintCount } = header;

  reader.seek(region.position);

  if (constraintCount > limits.maxConstraints) {
    throw new OverflowGuardError(
      `constraint count ${constraintCount} exceeds ceiling ${limits.maxConstraints}`,
      { constraintCount, ceiling: limits.maxConstraints },
    );
  }
  if (constraintCount * MIN_CONSTRAINT_SIZE > end - region.position) {
    throw new OverflowGuardError(
      `constraint count ${constraintCount} cannot fit in ${end - region.position} bytes`,
      { constraintCount, available: end - region.position },
    );
  }

  const constraints: Constraint[] = [];
  for (let i = 0; i < constraintCount; i++) {
    const a = readCombination(reader, header, order, limits, end, i, "a");
    const b = readCombination(reader, header, order, limits, end, i, "b");
    const c = readCombination(reader, header, order, limits, end, i, "c");
    constraints.push({ a, b, c });
  }

  if (region.size !== undefined && reader.position !== end) {
    throw new FormatError(
      `constraint section declares ${region.size} bytes but ${reader.position - region.position} were decoded`,
      { declared: region.size, decoded: reader.position - region.position },
    );
  }

  logger.debug(`decoded ${constraints.length} constraints`);
  return constraints;
}

function readCombination(
  reader: BinaryReader,
  header: FileHeader,
  order: ByteOrder,
  limits: DecodeLimits,
  end: number,
  constraintIndex: number,
  matrix: Matrix,
): SparseLinearCombination {
  const where = `constraint ${constraintIndex} ${matrix.toUpperCase()}`;
  if (reader.position + 4 > end) {
    throw new FormatError(`unexpected end of constraint data reading ${where} term count`, {
      constraint: constraintIndex,
      matrix,
    });
  }
  const termCount = reader.readU32(`${where} term count`);
  const termSize = 4 + header.fieldElementSize;

  if (termCount > limits.maxTermsPerCombination) {
    throw new OverflowGuardError(
      `${where} declares ${termCount} terms, above ceiling ${limits.maxTermsPerCombination}`,
      { constraint: constraintIndex, matrix, termCount, ceiling: limits.maxTermsPerCombination },
    );
  }
  if (termCount * termSize > end - reader.position) {
    throw new OverflowGuardError(
      `${where} declares ${termCount} terms but only ${end - reader.position} bytes remain`,
      { constraint: constraintIndex, matrix, termCount, available: end - reader.position },
    );
  }

  const terms: SparseLinearCombination = [];
  for (let j = 0; j < termCount; j++) {
    const wireIndex = reader.readU32(`${where} term ${j} wire index`);
    const coefficient = readFieldElement(
      reader,
      header.fieldElementSize,
      order,
      `${where} term ${j} coefficient`,
    );
    terms.push({ wireIndex, coefficient });
  }
  return terms;
}
