import type { CurveName } from "../field";

export type R1csLayout = "sectioned" | "flat";

export type ByteOrder = "le" | "be";

/** ASCII "r1cs" */
export const R1CS_MAGIC = new Uint8Array([0x72, 0x31, 0x63, 0x73]);

export const SUPPORTED_VERSIONS: readonly number[] = [1];

export enum R1csSectionType {
  Header = 1,
  Constraints = 2,
  Wire2Label = 3,
  CustomGatesList = 4,
  CustomGatesApplication = 5,
}

/** Byte order of coefficients (and embedded witness values) per layout */
export const COEFFICIENT_BYTE_ORDER: Record<R1csLayout, ByteOrder> = {
  sectioned: "le",
  flat: "be",
};

export interface FileHeader {
  magic: Uint8Array;
  version: number;
  layout: R1csLayout;
  /** Coefficient width in bytes */
  fieldElementSize: number;
  totalWireCount: number;
  publicInputCount: number;
  /** Wires that are neither the constant nor public, intermediate signals included */
  privateInputCount: number;
  constraintCount: number;
  /** Field prime, present in sectioned containers only */
  prime?: bigint;
  curve: CurveName;
  /** Sectioned containers split public wires into outputs and inputs */
  outputCount?: number;
  /** Explicit private input signals (sectioned only) */
  privateInputSignalCount?: number;
  labelCount?: bigint;
}

export interface Term {
  wireIndex: number;
  coefficient: bigint;
}

export type SparseLinearCombination = Term[];

export interface Constraint {
  a: SparseLinearCombination;
  b: SparseLinearCombination;
  c: SparseLinearCombination;
}

export type Matrix = keyof Constraint;

export const MATRICES: readonly Matrix[] = ["a", "b", "c"];

export interface R1csFile {
  header: FileHeader;
  constraints: Constraint[];
  /** Witness values appended to a flat container, if any */
  embeddedWitness?: bigint[];
}

export interface DecodeLimits {
  maxTermsPerCombination: number;
  maxConstraints: number;
  maxFieldElementSize: number;
}

export const DEFAULT_LIMITS: DecodeLimits = {
  maxTermsPerCombination: 10_000,
  maxConstraints: 1 << 20,
  maxFieldElementSize: 64,
};
