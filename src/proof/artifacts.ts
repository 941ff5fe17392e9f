import { readFileSync } from "fs";
import { z } from "zod";
import { FormatError } from "../errors";

export interface Fq2 {
  c0: bigint;
  c1: bigint;
}

export interface G1Affine {
  x: bigint;
  y: bigint;
  infinity: boolean;
}

export interface G2Affine {
  x: Fq2;
  y: Fq2;
  infinity: boolean;
}

export interface Groth16Proof {
  a: G1Affine;
  b: G2Affine;
  c: G1Affine;
}

export interface Groth16VerifyingKey {
  alpha: G1Affine;
  beta: G2Affine;
  gamma: G2Affine;
  delta: G2Affine;
  /** `1 + publicInputCount` points */
  ic: G1Affine[];
}

const Decimal = z.string().regex(/^\d+$/, "expected a decimal integer string");
const G1Json = z.tuple([Decimal, Decimal, Decimal]);
const Fq2Json = z.tuple([Decimal, Decimal]);
const G2Json = z.tuple([Fq2Json, Fq2Json, Fq2Json]);

/** Proof JSON as written by snarkjs for Groth16 over BLS12-381 */
export const SnarkjsProofZ = z.object({
  pi_a: G1Json,
  pi_b: G2Json,
  pi_c: G1Json,
  protocol: z.literal("groth16"),
  curve: z.literal("bls12381"),
});

export const SnarkjsVerifyingKeyZ = z
  .object({
    protocol: z.literal("groth16"),
    curve: z.literal("bls12381"),
    nPublic: z.number().int().nonnegative(),
    vk_alpha_1: G1Json,
    vk_beta_2: G2Json,
    vk_gamma_2: G2Json,
    vk_delta_2: G2Json,
    IC: z.array(G1Json).min(1),
  })
  .passthrough()
  .refine((vk) => vk.IC.length === vk.nPublic + 1, {
    message: "IC must hold nPublic + 1 points",
    path: ["IC"],
  });

export const SnarkjsPublicSignalsZ = z.array(Decimal);

export type SnarkjsProof = z.infer<typeof SnarkjsProofZ>;
export type SnarkjsVerifyingKey = z.infer<typeof SnarkjsVerifyingKeyZ>;
export type SnarkjsPublicSignals = z.infer<typeof SnarkjsPublicSignalsZ>;

type G1Tuple = z.infer<typeof G1Json>;
type G2Tuple = z.infer<typeof G2Json>;

function g1FromSnarkjs([x, y, zc]: G1Tuple, what: string): G1Affine {
  const depth = BigInt(zc);
  if (depth === 0n) return { x: 0n, y: 0n, infinity: true };
  if (depth !== 1n) {
    throw new FormatError(`${what} is not in affine form (z = ${zc})`);
  }
  return { x: BigInt(x), y: BigInt(y), infinity: false };
}

function g2FromSnarkjs([x, y, [z0, z1]]: G2Tuple, what: string): G2Affine {
  const depth = { c0: BigInt(z0), c1: BigInt(z1) };
  if (depth.c0 === 0n && depth.c1 === 0n) {
    return { x: { c0: 0n, c1: 0n }, y: { c0: 0n, c1: 0n }, infinity: true };
  }
  if (depth.c0 !== 1n || depth.c1 !== 0n) {
    throw new FormatError(`${what} is not in affine form (z = [${z0}, ${z1}])`);
  }
  return {
    x: { c0: BigInt(x[0]), c1: BigInt(x[1]) },
    y: { c0: BigInt(y[0]), c1: BigInt(y[1]) },
    infinity: false,
  };
}

export function proofFromSnarkjs(proof: SnarkjsProof): Groth16Proof {
  return {
    a: g1FromSnarkjs(proof.pi_a, "pi_a"),
    b: g2FromSnarkjs(proof.pi_b, "pi_b"),
    c: g1FromSnarkjs(proof.pi_c, "pi_c"),
  };
}

export function verifyingKeyFromSnarkjs(vk: SnarkjsVerifyingKey): Groth16VerifyingKey {
  return {
    alpha: g1FromSnarkjs(vk.vk_alpha_1, "vk_alpha_1"),
    beta: g2FromSnarkjs(vk.vk_beta_2, "vk_beta_2"),
    gamma: g2FromSnarkjs(vk.vk_gamma_2, "vk_gamma_2"),
    delta: g2FromSnarkjs(vk.vk_delta_2, "vk_delta_2"),
    ic: vk.IC.map((p, i) => g1FromSnarkjs(p, `IC[${i}]`)),
  };
}

export function publicInputsFromSnarkjs(signals: SnarkjsPublicSignals): bigint[] {
  return signals.map((s) => BigInt(s));
}

function parseWith<S extends z.ZodTypeAny>(schema: S, json: unknown, what: string): z.output<S> {
  const result = schema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new FormatError(`invalid ${what}: ${issues}`, undefined, { cause: result.error });
  }
  return result.data;
}

export function parseSnarkjsProof(json: unknown): SnarkjsProof {
  return parseWith(SnarkjsProofZ, json, "proof");
}

export function parseSnarkjsVerifyingKey(json: unknown): SnarkjsVerifyingKey {
  return parseWith(SnarkjsVerifyingKeyZ, json, "verification key");
}

export function parseSnarkjsPublicSignals(json: unknown): SnarkjsPublicSignals {
  return parseWith(SnarkjsPublicSignalsZ, json, "public signals");
}

export function readJsonFile(path: string): unknown {
  const text = readFileSync(path, "utf8");
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new FormatError(`${path} is not valid JSON`, undefined, { cause: e });
  }
}
