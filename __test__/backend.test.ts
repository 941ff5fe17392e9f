import { beforeEach, describe, it, expect, vi } from "vitest";
import { ConfigurationError, FormatError, SnarkjsGroth16Backend, type Logger } from "../src";
import { SNARKJS_PROOF, snarkjsVerifyingKey } from "./fixtures";

const snarkjs = vi.hoisted(() => ({
  verify: vi.fn(async (): Promise<boolean> => true),
  fullProve: vi.fn(async (): Promise<unknown> => ({})),
  newZKey: vi.fn(async (): Promise<unknown> => undefined),
  exportVerificationKey: vi.fn(async (): Promise<unknown> => ({})),
}));

vi.mock("snarkjs", () => ({
  groth16: { verify: snarkjs.verify, fullProve: snarkjs.fullProve },
  zKey: { newZKey: snarkjs.newZKey, exportVerificationKey: snarkjs.exportVerificationKey },
}));

function spyLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const circuit = { r1csPath: "c.r1cs", wasmPath: "c.wasm", inputs: { a: "3" } };

describe("SnarkjsGroth16Backend", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("needs both key paths for setup", async () => {
    await expect(new SnarkjsGroth16Backend().setup(circuit)).rejects.toThrow(ConfigurationError);
    await expect(
      new SnarkjsGroth16Backend({ zkeyPath: "c.zkey" }).setup(circuit),
    ).rejects.toThrow("Groth16 setup needs a powers-of-tau file and a zkey output path");
    expect(snarkjs.newZKey).not.toHaveBeenCalled();
  });

  it("writes the zkey and returns the exported verifying key", async () => {
    const logger = spyLogger();
    const backend = new SnarkjsGroth16Backend({ zkeyPath: "c.zkey", ptauPath: "pot.ptau" }, logger);
    snarkjs.exportVerificationKey.mockResolvedValueOnce(snarkjsVerifyingKey(1));

    const keys = await backend.setup(circuit);

    expect(snarkjs.newZKey).toHaveBeenCalledWith("c.r1cs", "pot.ptau", "c.zkey", logger);
    expect(snarkjs.exportVerificationKey).toHaveBeenCalledWith("c.zkey", logger);
    expect(keys).toEqual({ provingKey: "c.zkey", verifyingKey: snarkjsVerifyingKey(1) });
  });

  it("rejects a malformed exported verifying key", async () => {
    const backend = new SnarkjsGroth16Backend({ zkeyPath: "c.zkey", ptauPath: "pot.ptau" });

    await expect(backend.setup(circuit)).rejects.toThrow(FormatError);
  });

  it("needs the witness generator and inputs to prove", async () => {
    const backend = new SnarkjsGroth16Backend();

    await expect(backend.prove("c.zkey", { r1csPath: "c.r1cs", inputs: { a: "3" } })).rejects.toThrow(
      "proving needs the circuit's wasm witness generator and inputs",
    );
    await expect(backend.prove("c.zkey", { r1csPath: "c.r1cs", wasmPath: "c.wasm" })).rejects.toThrow(
      ConfigurationError,
    );
    expect(snarkjs.fullProve).not.toHaveBeenCalled();
  });

  it("proves with the zkey and parses what snarkjs returns", async () => {
    const logger = spyLogger();
    const backend = new SnarkjsGroth16Backend({}, logger);
    snarkjs.fullProve.mockResolvedValueOnce({ proof: SNARKJS_PROOF, publicSignals: ["9"] });

    const result = await backend.prove("c.zkey", circuit);

    expect(snarkjs.fullProve).toHaveBeenCalledWith({ a: "3" }, "c.wasm", "c.zkey", logger);
    expect(result).toEqual({ proof: SNARKJS_PROOF, publicSignals: ["9"] });
  });

  it("forwards verification to snarkjs", async () => {
    const logger = spyLogger();
    const backend = new SnarkjsGroth16Backend({}, logger);
    const vk = snarkjsVerifyingKey(1);
    snarkjs.verify.mockResolvedValueOnce(false);

    await expect(backend.verify(vk, ["9"], SNARKJS_PROOF)).resolves.toBe(false);
    expect(snarkjs.verify).toHaveBeenCalledWith(vk, ["9"], SNARKJS_PROOF, logger);

    await expect(backend.verify(vk, ["9"], SNARKJS_PROOF)).resolves.toBe(true);
  });
});
