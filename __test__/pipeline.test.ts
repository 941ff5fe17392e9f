import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterAll, beforeAll, describe, it, expect, vi } from "vitest";
import {
  BoundsError,
  CheckZkpPipeline,
  ConfigurationError,
  InMemoryConstraintSystem,
  ProofVerificationError,
  bytesToHex,
  encodeR1cs,
  loadBls12381,
  packageProof,
  valuesPolicy,
  type Logger,
  type PairingCurve,
  type PipelineConfigInput,
} from "../src";
import {
  PROOF,
  SCENARIO_WITNESS,
  SNARKJS_PROOF,
  sectionedScenario,
  snarkjsVerifyingKey,
  verifyingKey,
} from "./fixtures";

describe("CheckZkpPipeline", () => {
  let dir: string;
  let config: PipelineConfigInput;
  let curve: PairingCurve;

  beforeAll(async () => {
    curve = await loadBls12381();
    dir = mkdtempSync(join(tmpdir(), "checkzkp-pipeline-"));
    writeFileSync(join(dir, "circuit.r1cs"), encodeR1cs(sectionedScenario()));
    writeFileSync(join(dir, "proof.json"), JSON.stringify(SNARKJS_PROOF));
    writeFileSync(join(dir, "verification_key.json"), JSON.stringify(snarkjsVerifyingKey(2)));
    writeFileSync(join(dir, "public.json"), JSON.stringify(["0", "0"]));
    writeFileSync(join(dir, "public-short.json"), JSON.stringify(["0"]));
    config = {
      r1csPath: join(dir, "circuit.r1cs"),
      proofPath: join(dir, "proof.json"),
      verifyingKeyPath: join(dir, "verification_key.json"),
      publicSignalsPath: join(dir, "public.json"),
      outDir: join(dir, "out"),
    };
  });

  afterAll(async () => {
    rmSync(dir, { recursive: true, force: true });
    await curve.terminate();
  });

  it("decodes, packages and writes the artifacts", async () => {
    const { circuit, items, script, files } = await new CheckZkpPipeline(config).run();

    expect(circuit.header.publicInputCount).toBe(2);
    expect(items).toEqual(packageProof(PROOF, verifyingKey(3), [0n, 0n], curve));
    expect(items).toHaveLength(17);
    expect(readFileSync(files.script, "utf8")).toBe(bytesToHex(script) + "\n");
    expect(readFileSync(files.items, "utf8").split("\n")[0]).toBe("0:00");
  });

  it("leaves a curve it was given open", async () => {
    const terminate = vi.fn(async () => undefined);
    const shared: PairingCurve = { G1: curve.G1, G2: curve.G2, terminate };
    const pipeline = new CheckZkpPipeline(config, undefined, undefined, shared);

    const { items } = await pipeline.run();
    await pipeline.close();
    expect(items).toHaveLength(17);
    expect(terminate).not.toHaveBeenCalled();
  });

  it("checks the proof with the backend when asked to", async () => {
    const verify = vi.fn(async () => true);
    const pipeline = new CheckZkpPipeline({ ...config, verifyWithBackend: true }, undefined, {
      verify,
    });

    await pipeline.run();
    expect(verify).toHaveBeenCalledWith(snarkjsVerifyingKey(2), ["0", "0"], SNARKJS_PROOF);
  });

  it("stops when the backend rejects the proof", async () => {
    const pipeline = new CheckZkpPipeline({ ...config, verifyWithBackend: true }, undefined, {
      verify: async () => false,
    });

    await expect(pipeline.run()).rejects.toThrow(ProofVerificationError);
  });

  it("needs a backend to verify with", async () => {
    const pipeline = new CheckZkpPipeline({ ...config, verifyWithBackend: true });

    await expect(pipeline.run()).rejects.toThrow(ConfigurationError);
  });

  it("rejects a proof for a different number of public inputs", async () => {
    const pipeline = new CheckZkpPipeline({
      ...config,
      publicSignalsPath: join(dir, "public-short.json"),
    });

    await expect(pipeline.run()).rejects.toThrow(BoundsError);
    await expect(pipeline.run()).rejects.toThrow("circuit has 2 public inputs, proof carries 1");
  });

  it("needs every artifact path to package", () => {
    const pipeline = new CheckZkpPipeline({ r1csPath: config.r1csPath });

    expect(() => pipeline.loadArtifacts()).toThrow(ConfigurationError);
  });

  it("rejects an invalid configuration up front", () => {
    expect(() => new CheckZkpPipeline({ ...config, limits: { maxConstraints: -1 } })).toThrow(
      "invalid configuration: limits.maxConstraints",
    );
  });

  it("synthesizes the circuit and logs violated constraints", () => {
    const warn = vi.fn();
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() };
    const pipeline = new CheckZkpPipeline(config, logger);
    const circuit = pipeline.loadCircuit();

    const satisfied = new InMemoryConstraintSystem();
    const witness = pipeline.synthesize(
      satisfied,
      circuit,
      [0n, 0n],
      valuesPolicy(new Map([[4, 42n]])),
    );
    expect(witness).toEqual(SCENARIO_WITNESS);
    expect(satisfied.isSatisfied()).toBe(true);
    expect(warn).not.toHaveBeenCalled();

    const violated = new InMemoryConstraintSystem();
    pipeline.synthesize(violated, circuit, [1n, 0n], valuesPolicy(new Map([[4, 42n]])));
    expect(violated.whichIsUnsatisfied()).toBe(0);
    expect(warn).toHaveBeenCalledWith("witness violates 2 of 4 constraints (first: 0)");
  });
});
