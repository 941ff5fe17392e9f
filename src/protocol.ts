/**
 * Wire-format constants of the script validator a packaging pass targets.
 * Every value here is part of the on-chain format: changing one breaks
 * existing verifiers, so each profile is locked down by golden vectors in
 * the test suite.
 */
export interface ProtocolProfile {
  id: string;
  /** First stack item, selecting the proof system */
  modeByte: number;
  /** Width of one base-field proof coordinate */
  coordinateSize: number;
  g1CompressedSize: number;
  g2CompressedSize: number;
  /** Width of one public input scalar */
  scalarSize: number;
  maxPublicInputs: number;
  vkChunkSize: number;
  vkChunkCount: number;
  /**
   * `reverse` pushes the last packaged item first, so the validator pops
   * items in packaging order.
   */
  pushOrder: "forward" | "reverse";
  terminalOpcode: number;
}

export const OP_CHECKZKP = 0xb9;

/** Groth16 over BLS12-381, `OP_CHECKZKP` mode 0 */
export const DIP69_MODE0: ProtocolProfile = Object.freeze({
  id: "dip69-mode0",
  modeByte: 0x00,
  coordinateSize: 48,
  g1CompressedSize: 48,
  g2CompressedSize: 96,
  scalarSize: 32,
  maxPublicInputs: 2,
  vkChunkSize: 80,
  vkChunkCount: 6,
  pushOrder: "reverse",
  terminalOpcode: OP_CHECKZKP,
});

export const PROTOCOL_IDS = ["dip69-mode0"] as const;

export type ProtocolId = (typeof PROTOCOL_IDS)[number];

export const PROTOCOLS: Readonly<Record<ProtocolId, ProtocolProfile>> = {
  "dip69-mode0": DIP69_MODE0,
};

export function getProtocolProfile(id: ProtocolId): ProtocolProfile {
  return PROTOCOLS[id];
}

/** Number of items one packaging pass produces for `publicInputCount` inputs */
export function stackItemCount(profile: ProtocolProfile, publicInputCount: number): number {
  return 1 + profile.vkChunkCount + publicInputCount + 8;
}
