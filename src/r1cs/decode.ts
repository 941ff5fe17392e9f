import { readFileSync } from "fs";
import { FormatError } from "../errors";
import { silentLogger, type Logger } from "../logger";
import { decodeConstraints, readFieldElement } from "./constraints";
import { decodeHeader } from "./header";
import { BinaryReader } from "./reader";
import {
  COEFFICIENT_BYTE_ORDER,
  type DecodeLimits,
  type FileHeader,
  type R1csFile,
  type R1csLayout,
} from "./types";

export interface R1csDecodeOptions {
  layout?: R1csLayout;
  limits?: Partial<DecodeLimits>;
  logger?: Logger;
}

/** Decode a whole container: header, constraints and, for flat files, the embedded witness */
export function decodeR1cs(
  bytes: Uint8Array,
  options: R1csDecodeOptions = {},
): R1csFile {
  const logger = options.logger ?? silentLogger;
  const reader = new BinaryReader(bytes);
  const { header, constraints: region } = decodeHeader(reader, options);
  const constraints = decodeConstraints(reader, header, region, options);

  const file: R1csFile = { header, constraints };
  if (header.layout === "flat") {
    const witness = readEmbeddedWitness(reader, header);
    if (witness) {
      logger.debug(`container embeds a witness of ${witness.length} values`);
      file.embeddedWitness = witness;
    }
  }
  return file;
}

export function readR1csFile(path: string, options: R1csDecodeOptions = {}): R1csFile {
  const logger = options.logger ?? silentLogger;
  const bytes = new Uint8Array(readFileSync(path));
  logger.info(`reading R1CS container ${path} (${bytes.length} bytes)`);
  const file = decodeR1cs(bytes, options);
  logger.info(
    `decoded ${file.constraints.length} constraints over ${file.header.totalWireCount} wires ` +
      `(${file.header.publicInputCount} public)`,
  );
  return file;
}

function readEmbeddedWitness(
  reader: BinaryReader,
  header: FileHeader,
): bigint[] | undefined {
  if (reader.remaining === 0) return undefined;

  const expected = header.totalWireCount * header.fieldElementSize;
  if (reader.remaining !== expected) {
    throw new FormatError(
      `${reader.remaining} trailing bytes after constraints; an embedded witness takes exactly ${expected}`,
      { trailing: reader.remaining, expected },
    );
  }

  const order = COEFFICIENT_BYTE_ORDER[header.layout];
  const witness: bigint[] = [];
  for (let i = 0; i < header.totalWireCount; i++) {
    witness.push(readFieldElement(reader, header.fieldElementSize, order, `witness ${i}`));
  }
  return witness;
}
