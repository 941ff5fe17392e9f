import {
  BLS12_381_BASE_MODULUS,
  BLS12_381_SCALAR_MODULUS,
  type Constraint,
  type G1Affine,
  type G2Affine,
  type Groth16Proof,
  type Groth16VerifyingKey,
  type R1csFile,
  type SnarkjsProof,
  type SnarkjsVerifyingKey,
} from "../src";

const MINUS_ONE = BLS12_381_SCALAR_MODULUS - 1n;

/**
 * Five wires, two public inputs, four constraints:
 *   w4 * w1 = 0
 *   (w4 - 1) * w2 = 0
 *   0 * 1 = w1 + w2 - w3
 *   (w3 - 1) * w3 = 0
 */
export const SCENARIO_CONSTRAINTS: Constraint[] = [
  { a: [{ wireIndex: 4, coefficient: 1n }], b: [{ wireIndex: 1, coefficient: 1n }], c: [] },
  {
    a: [
      { wireIndex: 0, coefficient: MINUS_ONE },
      { wireIndex: 4, coefficient: 1n },
    ],
    b: [{ wireIndex: 2, coefficient: 1n }],
    c: [],
  },
  {
    a: [],
    b: [],
    c: [
      { wireIndex: 1, coefficient: 1n },
      { wireIndex: 2, coefficient: 1n },
      { wireIndex: 3, coefficient: MINUS_ONE },
    ],
  },
  {
    a: [
      { wireIndex: 0, coefficient: MINUS_ONE },
      { wireIndex: 3, coefficient: 1n },
    ],
    b: [{ wireIndex: 3, coefficient: 1n }],
    c: [],
  },
];

/** A witness satisfying every scenario constraint */
export const SCENARIO_WITNESS = [1n, 0n, 0n, 0n, 42n];

export function sectionedScenario(): R1csFile {
  return {
    header: {
      magic: new Uint8Array([0x72, 0x31, 0x63, 0x73]),
      version: 1,
      layout: "sectioned",
      fieldElementSize: 32,
      totalWireCount: 5,
      publicInputCount: 2,
      privateInputCount: 2,
      constraintCount: 4,
      prime: BLS12_381_SCALAR_MODULUS,
      curve: "bls12381",
      outputCount: 0,
      privateInputSignalCount: 1,
      labelCount: 5n,
    },
    constraints: SCENARIO_CONSTRAINTS,
  };
}

export function flatScenario(withWitness = false): R1csFile {
  const file: R1csFile = {
    header: {
      magic: new Uint8Array([0x72, 0x31, 0x63, 0x73]),
      version: 1,
      layout: "flat",
      fieldElementSize: 32,
      totalWireCount: 5,
      publicInputCount: 2,
      privateInputCount: 2,
      constraintCount: 4,
      curve: "unknown",
    },
    constraints: SCENARIO_CONSTRAINTS,
  };
  if (withWitness) file.embeddedWitness = [...SCENARIO_WITNESS];
  return file;
}

/** BLS12-381 G1 generator */
export const G1: G1Affine = {
  x: 0x17f1d3a73197d7942695638c4fa9ac0fc3688c4f9774b905a14e3a3f171bac586c55e83ff97a1aeffb3af00adb22c6bbn,
  y: 0x08b3f481e3aaa0f1a09e30ed741d8ae4fcf5e095d5d00af600db18cb2c04b3edd03cc744a2888ae40caa232946c5e7e1n,
  infinity: false,
};

export const NEG_G1: G1Affine = { ...G1, y: BLS12_381_BASE_MODULUS - G1.y };

/** BLS12-381 G2 generator */
export const G2: G2Affine = {
  x: {
    c0: 0x024aa2b2f08f0a91260805272dc51051c6e47ad4fa403b02b4510b647ae3d1770bac0326a805bbefd48056c8c121bdb8n,
    c1: 0x13e02b6052719f607dacd3a088274f65596bd0d09920b61ab5da61bbdc7f5049334cf11213945d57e5ac7d055d042b7en,
  },
  y: {
    c0: 0x0ce5d527727d6e118cc9cdc6da2e351aadfd9baa8cbdd3a76d429a695160d12c923ac9cc3baca289e193548608b82801n,
    c1: 0x0606c4a02ea734cc32acd2b02bc28b99cb3e287e85a763af267492ab572e99ab3f370d275cec1da1aaa9075ff05f79ben,
  },
  infinity: false,
};

export const NEG_G2: G2Affine = {
  x: G2.x,
  y: { c0: BLS12_381_BASE_MODULUS - G2.y.c0, c1: BLS12_381_BASE_MODULUS - G2.y.c1 },
  infinity: false,
};

export const G1_COMPRESSED =
  "97f1d3a73197d7942695638c4fa9ac0fc3688c4f9774b905a14e3a3f171bac586c55e83ff97a1aeffb3af00adb22c6bb";
export const NEG_G1_COMPRESSED =
  "b7f1d3a73197d7942695638c4fa9ac0fc3688c4f9774b905a14e3a3f171bac586c55e83ff97a1aeffb3af00adb22c6bb";
export const G2_COMPRESSED =
  "93e02b6052719f607dacd3a088274f65596bd0d09920b61ab5da61bbdc7f5049334cf11213945d57e5ac7d055d042b7e" +
  "024aa2b2f08f0a91260805272dc51051c6e47ad4fa403b02b4510b647ae3d1770bac0326a805bbefd48056c8c121bdb8";
export const NEG_G2_COMPRESSED =
  "b3e02b6052719f607dacd3a088274f65596bd0d09920b61ab5da61bbdc7f5049334cf11213945d57e5ac7d055d042b7e" +
  "024aa2b2f08f0a91260805272dc51051c6e47ad4fa403b02b4510b647ae3d1770bac0326a805bbefd48056c8c121bdb8";

export const PROOF: Groth16Proof = { a: G1, b: G2, c: NEG_G1 };

/** Verifying key for `icCount - 1` public inputs */
export function verifyingKey(icCount: number): Groth16VerifyingKey {
  return {
    alpha: G1,
    beta: G2,
    gamma: G2,
    delta: NEG_G2,
    ic: Array.from({ length: icCount }, (_, i) => (i % 2 === 0 ? G1 : NEG_G1)),
  };
}

const g1Json = (p: G1Affine): [string, string, string] => [p.x.toString(), p.y.toString(), "1"];
const g2Json = (p: G2Affine): [[string, string], [string, string], [string, string]] => [
  [p.x.c0.toString(), p.x.c1.toString()],
  [p.y.c0.toString(), p.y.c1.toString()],
  ["1", "0"],
];

export const SNARKJS_PROOF: SnarkjsProof = {
  pi_a: g1Json(PROOF.a),
  pi_b: g2Json(PROOF.b),
  pi_c: g1Json(PROOF.c),
  protocol: "groth16",
  curve: "bls12381",
};

export function snarkjsVerifyingKey(nPublic: number): SnarkjsVerifyingKey {
  const vk = verifyingKey(nPublic + 1);
  return {
    protocol: "groth16",
    curve: "bls12381",
    nPublic,
    vk_alpha_1: g1Json(vk.alpha),
    vk_beta_2: g2Json(vk.beta),
    vk_gamma_2: g2Json(vk.gamma),
    vk_delta_2: g2Json(vk.delta),
    IC: vk.ic.map(g1Json),
  };
}

/** Run `fn` and return what it throws */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected an error to be thrown");
}

/** Little-endian hex of `value` in `width` bytes, built from its big-endian hex */
export function leHex(value: bigint, width: number): string {
  const be = value.toString(16).padStart(width * 2, "0");
  return (be.match(/../g) ?? []).reverse().join("");
}

export function setU32(bytes: Uint8Array, offset: number, value: number): void {
  new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).setUint32(offset, value, true);
}
