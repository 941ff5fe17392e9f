import { SerializationSizeError } from "./errors";

/** BLS12-381 base field modulus (Fq) */
export const BLS12_381_BASE_MODULUS =
  0x1a0111ea397fe69a4b1ba7b6434bacd764774b84f38512bf6730d2a0f6b0f6241eabfffeb153ffffb9feffffffffaaabn;

/** BLS12-381 scalar field modulus (Fr) */
export const BLS12_381_SCALAR_MODULUS =
  0x73eda753299d7d483339d80809a1d80553bda402fffe5bfeffffffff00000001n;

/** BN254 scalar field modulus, the circom default */
export const BN128_SCALAR_MODULUS =
  21888242871839275222246405745257275088548364400416034343698204186575808495617n;

export type CurveName = "bls12381" | "bn128" | "unknown";

export function detectCurveFromPrime(prime: bigint): CurveName {
  if (prime === BLS12_381_SCALAR_MODULUS) return "bls12381";
  if (prime === BN128_SCALAR_MODULUS) return "bn128";
  return "unknown";
}

/** Canonical representative of `value` in [0, modulus - 1] */
export function mod(value: bigint, modulus: bigint): bigint {
  const r = value % modulus;
  return r < 0n ? r + modulus : r;
}

export function bigIntFromBytesLE(bytes: Uint8Array): bigint {
  let value = 0n;
  for (let i = bytes.length - 1; i >= 0; i--) {
    value = (value << 8n) | BigInt(bytes[i] ?? 0);
  }
  return value;
}

export function bigIntFromBytesBE(bytes: Uint8Array): bigint {
  let value = 0n;
  for (const byte of bytes) {
    value = (value << 8n) | BigInt(byte);
  }
  return value;
}

/**
 * Little-endian encoding of `value` in exactly `width` bytes, zero-padded at
 * the high-order end. Values that need more than `width` bytes are rejected.
 */
export function bigIntToBytesLE(value: bigint, width: number): Uint8Array {
  if (value < 0n) {
    throw new SerializationSizeError(`cannot encode negative value ${value}`);
  }
  const out = new Uint8Array(width);
  let v = value;
  for (let i = 0; i < width; i++) {
    out[i] = Number(v & 0xffn);
    v >>= 8n;
  }
  if (v !== 0n) {
    throw new SerializationSizeError(`value does not fit in ${width} bytes`, {
      width,
      value,
    });
  }
  return out;
}

export function bigIntToBytesBE(value: bigint, width: number): Uint8Array {
  return bigIntToBytesLE(value, width).reverse();
}

export function bytesToHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("hex");
}
