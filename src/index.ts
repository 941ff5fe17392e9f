export * from "./errors";
export * from "./field";
export * from "./logger";
export * from "./protocol";
export * from "./r1cs";
export * from "./circuit/constraint-system";
export * from "./circuit/builder";
export * from "./circuit/witness";
export * from "./proof/artifacts";
export * from "./proof/curve";
export * from "./proof/encoding";
export * from "./proof/packager";
export * from "./script/assembler";
export {
  OP_0,
  MAX_DIRECT_PUSH,
  OP_PUSHDATA1,
  OP_PUSHDATA2,
  MAX_PUSHDATA2,
} from "./script/opcodes";
export * from "./output";
export * from "./config";
export {
  SnarkjsGroth16Backend,
  type ProvingBackend,
  type ProofAndSignals,
  type SnarkjsCircuit,
  type SnarkjsKeyPaths,
} from "./backend/snarkjs";
export * from "./pipeline";
