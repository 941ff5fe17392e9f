import * as snarkjs from "snarkjs";

/** One group of a snarkjs wasm curve. Points are its internal projective buffers. */
export interface CurveGroup {
  fromObject(coordinates: unknown[]): Uint8Array;
  toAffine(point: Uint8Array): Uint8Array;
  toObject(point: Uint8Array): unknown;
  isValid(point: Uint8Array): boolean;
}

export interface PairingCurve {
  G1: CurveGroup;
  G2: CurveGroup;
  terminate(): Promise<void>;
}

/** BLS12-381 from snarkjs, on the calling thread and not shared between callers */
export async function loadBls12381(): Promise<PairingCurve> {
  // @ts-expect-error curves is not typed
  const curve: PairingCurve = await snarkjs.curves.getCurveFromName("bls12381", {
    singleThread: true,
  });
  return curve;
}
