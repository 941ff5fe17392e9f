import { z } from "zod";
import { SerializationSizeError } from "../errors";
import {
  BLS12_381_BASE_MODULUS,
  BLS12_381_SCALAR_MODULUS,
  bigIntToBytesBE,
  bigIntToBytesLE,
} from "../field";
import type { Fq2, G1Affine, G2Affine } from "./artifacts";
import type { PairingCurve } from "./curve";

/** Width of one BLS12-381 base-field element */
export const FQ_SIZE = 48;

const FLAG_COMPRESSED = 0x80;
const FLAG_INFINITY = 0x40;
const FLAG_Y_LARGEST = 0x20;

const HALF_P = (BLS12_381_BASE_MODULUS - 1n) / 2n;

/** Throws unless `bytes` is exactly `expected` long */
export function assertSize(bytes: Uint8Array, expected: number, what: string): Uint8Array {
  if (bytes.length !== expected) {
    throw new SerializationSizeError(
      `${what} serialized to ${bytes.length} bytes, protocol expects ${expected}`,
      { what, actual: bytes.length, expected },
    );
  }
  return bytes;
}

function assertBaseField(value: bigint, what: string): void {
  if (value < 0n || value >= BLS12_381_BASE_MODULUS) {
    throw new SerializationSizeError(`${what} is not a canonical base-field element`, { what });
  }
}

/** Base-field coordinate as a little-endian element of `size` bytes */
export function encodeCoordinate(value: bigint, size: number, what: string): Uint8Array {
  assertBaseField(value, what);
  return assertSize(bigIntToBytesLE(value, size), size, what);
}

/** Scalar-field value, little-endian, zero-padded at the high-order end */
export function encodeScalar(value: bigint, size: number, what: string): Uint8Array {
  if (value < 0n || value >= BLS12_381_SCALAR_MODULUS) {
    throw new SerializationSizeError(`${what} is not a canonical scalar`, { what });
  }
  return assertSize(bigIntToBytesLE(value, size), size, what);
}

function isLargestFq(y: bigint): boolean {
  return y > HALF_P;
}

/** Fq2 elements order by c1 first, then c0 */
function isLargestFq2(y: Fq2): boolean {
  return y.c1 !== 0n ? isLargestFq(y.c1) : isLargestFq(y.c0);
}

const G1Object = z.tuple([z.bigint(), z.bigint(), z.bigint()]);
const Fq2Object = z.tuple([z.bigint(), z.bigint()]);
const G2Object = z.tuple([Fq2Object, Fq2Object, Fq2Object]);

function notOnCurve(what: string): SerializationSizeError {
  return new SerializationSizeError(`${what} is not on the curve`, { what });
}

/**
 * Load `point` into the curve and return its affine coordinates as the curve
 * reports them. Off-curve points are a SerializationSizeError.
 */
export function checkG1(point: G1Affine, curve: PairingCurve, what = "G1 point"): G1Affine {
  if (point.infinity) return point;
  assertBaseField(point.x, `${what}.x`);
  assertBaseField(point.y, `${what}.y`);

  const loaded = curve.G1.fromObject([point.x, point.y, 1n]);
  if (!curve.G1.isValid(loaded)) throw notOnCurve(what);
  const [x, y] = G1Object.parse(curve.G1.toObject(curve.G1.toAffine(loaded)));
  return { x, y, infinity: false };
}

export function checkG2(point: G2Affine, curve: PairingCurve, what = "G2 point"): G2Affine {
  if (point.infinity) return point;
  for (const [name, value] of [
    ["x.c0", point.x.c0],
    ["x.c1", point.x.c1],
    ["y.c0", point.y.c0],
    ["y.c1", point.y.c1],
  ] as const) {
    assertBaseField(value, `${what}.${name}`);
  }

  const loaded = curve.G2.fromObject([
    [point.x.c0, point.x.c1],
    [point.y.c0, point.y.c1],
    [1n, 0n],
  ]);
  if (!curve.G2.isValid(loaded)) throw notOnCurve(what);
  const [[x0, x1], [y0, y1]] = G2Object.parse(curve.G2.toObject(curve.G2.toAffine(loaded)));
  return { x: { c0: x0, c1: x1 }, y: { c0: y0, c1: y1 }, infinity: false };
}

/**
 * Compressed G1 point: big-endian x with the compression, infinity and
 * y-sign flags in the top bits of the first byte.
 */
export function compressG1(point: G1Affine, curve: PairingCurve, what = "G1 point"): Uint8Array {
  const out = new Uint8Array(FQ_SIZE);
  if (point.infinity) {
    out[0] = FLAG_COMPRESSED | FLAG_INFINITY;
    return out;
  }
  const { x, y } = checkG1(point, curve, what);
  out.set(bigIntToBytesBE(x, FQ_SIZE));
  out[0] = (out[0] ?? 0) | FLAG_COMPRESSED | (isLargestFq(y) ? FLAG_Y_LARGEST : 0);
  return out;
}

/** Compressed G2 point: `x.c1 ‖ x.c0`, both big-endian, flags as for G1 */
export function compressG2(point: G2Affine, curve: PairingCurve, what = "G2 point"): Uint8Array {
  const out = new Uint8Array(2 * FQ_SIZE);
  if (point.infinity) {
    out[0] = FLAG_COMPRESSED | FLAG_INFINITY;
    return out;
  }
  const { x, y } = checkG2(point, curve, what);
  out.set(bigIntToBytesBE(x.c1, FQ_SIZE), 0);
  out.set(bigIntToBytesBE(x.c0, FQ_SIZE), FQ_SIZE);
  out[0] = (out[0] ?? 0) | FLAG_COMPRESSED | (isLargestFq2(y) ? FLAG_Y_LARGEST : 0);
  return out;
}
