import { afterAll, beforeAll, describe, it, expect } from "vitest";
import {
  BLS12_381_BASE_MODULUS,
  BLS12_381_SCALAR_MODULUS,
  SerializationSizeError,
  bigIntToBytesLE,
  bytesToHex,
  checkG1,
  checkG2,
  compressG1,
  compressG2,
  encodeCoordinate,
  encodeScalar,
  loadBls12381,
  type PairingCurve,
} from "../src";
import {
  G1,
  G1_COMPRESSED,
  G2,
  G2_COMPRESSED,
  NEG_G1,
  NEG_G1_COMPRESSED,
  NEG_G2,
  NEG_G2_COMPRESSED,
} from "./fixtures";

describe("point compression", () => {
  let curve: PairingCurve;

  beforeAll(async () => {
    curve = await loadBls12381();
  });

  afterAll(async () => {
    await curve.terminate();
  });

  it("compresses the G1 generator and its negation", () => {
    expect(bytesToHex(compressG1(G1, curve))).toBe(G1_COMPRESSED);
    expect(bytesToHex(compressG1(NEG_G1, curve))).toBe(NEG_G1_COMPRESSED);
  });

  it("compresses the G2 generator with x.c1 first", () => {
    expect(bytesToHex(compressG2(G2, curve))).toBe(G2_COMPRESSED);
    expect(bytesToHex(compressG2(NEG_G2, curve))).toBe(NEG_G2_COMPRESSED);
  });

  it("encodes the point at infinity as flags only", () => {
    expect(bytesToHex(compressG1({ x: 0n, y: 0n, infinity: true }, curve))).toBe(
      "c0" + "00".repeat(47),
    );
    const g2 = compressG2({ x: { c0: 0n, c1: 0n }, y: { c0: 0n, c1: 0n }, infinity: true }, curve);
    expect(bytesToHex(g2)).toBe("c0" + "00".repeat(95));
  });

  it("rejects non-canonical coordinates", () => {
    expect(() => compressG1({ ...G1, x: BLS12_381_BASE_MODULUS }, curve)).toThrow(
      "G1 point.x is not a canonical base-field element",
    );
    expect(() => compressG2({ ...G2, y: { c0: G2.y.c0, c1: -1n } }, curve, "vk.beta")).toThrow(
      SerializationSizeError,
    );
  });

  it("rejects points that are not on the curve", () => {
    expect(() => compressG1({ x: 1n, y: 1n, infinity: false }, curve)).toThrow(
      SerializationSizeError,
    );
    expect(() => compressG1({ x: 1n, y: 1n, infinity: false }, curve, "vk.alpha")).toThrow(
      "vk.alpha is not on the curve",
    );
    expect(() => compressG2({ ...G2, y: { c0: G2.y.c0, c1: G2.y.c0 } }, curve, "vk.beta")).toThrow(
      "vk.beta is not on the curve",
    );
  });

  it("returns the coordinates of points on the curve", () => {
    expect(checkG1(NEG_G1, curve)).toEqual(NEG_G1);
    expect(checkG2(G2, curve)).toEqual(G2);
  });
});

describe("field encoding", () => {
  it("writes scalars little-endian, zero-padded at the high end", () => {
    expect(bytesToHex(encodeScalar(0x0102n, 32, "input"))).toBe("0201" + "00".repeat(30));
  });

  it("rejects scalars outside the scalar field", () => {
    expect(() => encodeScalar(BLS12_381_SCALAR_MODULUS, 32, "input")).toThrow(
      "input is not a canonical scalar",
    );
  });

  it("writes base-field coordinates little-endian", () => {
    const bytes = encodeCoordinate(BLS12_381_BASE_MODULUS - 1n, 48, "c.x");

    expect(bytes.length).toBe(48);
    expect(bytes[0]).toBe(0xaa);
    expect(bytes[47]).toBe(0x1a);
  });

  it("rejects values wider than the target", () => {
    expect(() => bigIntToBytesLE(256n, 1)).toThrow(SerializationSizeError);
    expect(() => bigIntToBytesLE(-1n, 4)).toThrow("cannot encode negative value -1");
  });
});
