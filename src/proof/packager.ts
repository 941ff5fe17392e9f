import { ProtocolShapeError } from "../errors";
import { silentLogger, type Logger } from "../logger";
import { DIP69_MODE0, stackItemCount, type ProtocolProfile } from "../protocol";
import type { Groth16Proof, Groth16VerifyingKey } from "./artifacts";
import type { PairingCurve } from "./curve";
import {
  assertSize,
  checkG1,
  checkG2,
  compressG1,
  compressG2,
  encodeCoordinate,
  encodeScalar,
} from "./encoding";

/** Bytes destined for one push operation */
export type StackItem = Uint8Array;

/**
 * What to do when the verifying key yields fewer chunks than the profile
 * requires. Too many chunks always fails.
 */
export type ChunkCountPolicy = "strict" | "pad";

export interface PackageOptions {
  profile?: ProtocolProfile;
  chunkCountPolicy?: ChunkCountPolicy;
  logger?: Logger;
}

/** `alpha ‖ beta ‖ gamma ‖ delta ‖ ic[0..]`, every point compressed */
export function serializeVerifyingKey(
  vk: Groth16VerifyingKey,
  curve: PairingCurve,
  profile: ProtocolProfile = DIP69_MODE0,
): Uint8Array {
  const g1 = (point: Groth16VerifyingKey["alpha"], what: string) =>
    assertSize(compressG1(point, curve, what), profile.g1CompressedSize, what);
  const g2 = (point: Groth16VerifyingKey["beta"], what: string) =>
    assertSize(compressG2(point, curve, what), profile.g2CompressedSize, what);

  const parts: Uint8Array[] = [g1(vk.alpha, "vk.alpha")];
  for (const name of ["beta", "gamma", "delta"] as const) {
    parts.push(g2(vk[name], `vk.${name}`));
  }
  for (const [i, point] of vk.ic.entries()) {
    parts.push(g1(point, `vk.ic[${i}]`));
  }
  return new Uint8Array(Buffer.concat(parts));
}

/**
 * Split the serialized key into `profile.vkChunkSize` chunks, zero-padding
 * the last one on the right, and check the count against the profile.
 */
export function chunkVerifyingKey(
  buffer: Uint8Array,
  profile: ProtocolProfile = DIP69_MODE0,
  policy: ChunkCountPolicy = "strict",
  logger: Logger = silentLogger,
): StackItem[] {
  const size = profile.vkChunkSize;
  const chunks: StackItem[] = [];
  for (let offset = 0; offset < buffer.length; offset += size) {
    const chunk = new Uint8Array(size);
    chunk.set(buffer.subarray(offset, offset + size));
    chunks.push(chunk);
  }

  if (chunks.length > profile.vkChunkCount) {
    throw new ProtocolShapeError(
      `verifying key needs ${chunks.length} chunks of ${size} bytes, ${profile.id} carries ${profile.vkChunkCount}`,
      { chunks: chunks.length, expected: profile.vkChunkCount, bytes: buffer.length },
    );
  }
  if (chunks.length < profile.vkChunkCount) {
    if (policy === "strict") {
      throw new ProtocolShapeError(
        `verifying key fills ${chunks.length} chunks of ${size} bytes, ${profile.id} expects ${profile.vkChunkCount}`,
        { chunks: chunks.length, expected: profile.vkChunkCount, bytes: buffer.length },
      );
    }
    logger.warn(
      `padding verifying key from ${chunks.length} to ${profile.vkChunkCount} chunks with zero bytes`,
    );
    while (chunks.length < profile.vkChunkCount) {
      chunks.push(new Uint8Array(size));
    }
  }
  return chunks;
}

/** The eight base-field coordinates of the proof, in protocol order */
export function serializeProof(
  proof: Groth16Proof,
  curve: PairingCurve,
  profile: ProtocolProfile = DIP69_MODE0,
): StackItem[] {
  const a = checkG1(proof.a, curve, "proof.a");
  const b = checkG2(proof.b, curve, "proof.b");
  const c = checkG1(proof.c, curve, "proof.c");
  const size = profile.coordinateSize;
  return [
    encodeCoordinate(a.x, size, "proof.a.x"),
    encodeCoordinate(a.y, size, "proof.a.y"),
    encodeCoordinate(b.x.c0, size, "proof.b.x0"),
    encodeCoordinate(b.x.c1, size, "proof.b.x1"),
    encodeCoordinate(b.y.c0, size, "proof.b.y0"),
    encodeCoordinate(b.y.c1, size, "proof.b.y1"),
    encodeCoordinate(c.x, size, "proof.c.x"),
    encodeCoordinate(c.y, size, "proof.c.y"),
  ];
}

/**
 * Stack items for one verification: the mode byte, the verifying key chunks,
 * the public inputs and the proof coordinates, in that order.
 */
export function packageProof(
  proof: Groth16Proof,
  vk: Groth16VerifyingKey,
  publicInputs: readonly bigint[],
  curve: PairingCurve,
  options: PackageOptions = {},
): StackItem[] {
  const profile = options.profile ?? DIP69_MODE0;
  const logger = options.logger ?? silentLogger;

  if (publicInputs.length > profile.maxPublicInputs) {
    throw new ProtocolShapeError(
      `${profile.id} accepts at most ${profile.maxPublicInputs} public inputs, got ${publicInputs.length}`,
      { publicInputs: publicInputs.length, max: profile.maxPublicInputs },
    );
  }
  if (vk.ic.length !== publicInputs.length + 1) {
    throw new ProtocolShapeError(
      `verifying key is for ${vk.ic.length - 1} public inputs, got ${publicInputs.length}`,
      { ic: vk.ic.length, publicInputs: publicInputs.length },
    );
  }

  const vkBytes = serializeVerifyingKey(vk, curve, profile);
  const chunks = chunkVerifyingKey(vkBytes, profile, options.chunkCountPolicy, logger);
  const inputs = publicInputs.map((value, i) =>
    encodeScalar(value, profile.scalarSize, `public input ${i}`),
  );

  const items: StackItem[] = [
    Uint8Array.of(profile.modeByte),
    ...chunks,
    ...inputs,
    ...serializeProof(proof, curve, profile),
  ];

  const expected = stackItemCount(profile, publicInputs.length);
  if (items.length !== expected) {
    throw new ProtocolShapeError(`packaged ${items.length} items, ${profile.id} expects ${expected}`);
  }
  logger.debug(
    `packaged ${items.length} stack items (${vkBytes.length} verifying key bytes in ${chunks.length} chunks)`,
  );
  return items;
}
