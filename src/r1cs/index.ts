export * from "./types";
export { BinaryReader } from "./reader";
export { decodeHeader, validateHeader, type HeaderDecodeOptions, type HeaderDecodeResult } from "./header";
export { decodeConstraints, readFieldElement, type ConstraintDecodeOptions } from "./constraints";
export { decodeR1cs, readR1csFile, type R1csDecodeOptions } from "./decode";
export { encodeR1cs, type RawSection, type R1csEncodeOptions } from "./encode";
