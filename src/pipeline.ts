import type { ProvingBackend } from "./backend/snarkjs";
import { synthesizeCircuit } from "./circuit/builder";
import type { ConstraintSystem } from "./circuit/constraint-system";
import {
  buildWitness,
  findUnsatisfied,
  witnessAssignment,
  zeroPolicy,
  type AssignmentPolicy,
} from "./circuit/witness";
import { parseConfig, type PipelineConfig, type PipelineConfigInput } from "./config";
import { BoundsError, ConfigurationError, ProofVerificationError } from "./errors";
import { BLS12_381_SCALAR_MODULUS } from "./field";
import { silentLogger, type Logger } from "./logger";
import { writeArtifacts, type WrittenArtifacts } from "./output";
import {
  parseSnarkjsProof,
  parseSnarkjsPublicSignals,
  parseSnarkjsVerifyingKey,
  proofFromSnarkjs,
  publicInputsFromSnarkjs,
  readJsonFile,
  verifyingKeyFromSnarkjs,
  type Groth16Proof,
  type Groth16VerifyingKey,
  type SnarkjsProof,
  type SnarkjsPublicSignals,
  type SnarkjsVerifyingKey,
} from "./proof/artifacts";
import { loadBls12381, type PairingCurve } from "./proof/curve";
import { packageProof, type StackItem } from "./proof/packager";
import { getProtocolProfile, type ProtocolProfile } from "./protocol";
import { readR1csFile } from "./r1cs/decode";
import type { R1csFile } from "./r1cs/types";
import { assembleScript } from "./script/assembler";

/** The part of a proving backend packaging needs: checking a finished proof */
export type ArtifactVerifier = Pick<
  ProvingBackend<never, never, SnarkjsVerifyingKey, SnarkjsProof, SnarkjsPublicSignals>,
  "verify"
>;

export type LoadedArtifacts = {
  raw: {
    proof: SnarkjsProof;
    verifyingKey: SnarkjsVerifyingKey;
    publicSignals: SnarkjsPublicSignals;
  };
  proof: Groth16Proof;
  verifyingKey: Groth16VerifyingKey;
  publicInputs: bigint[];
};

export type PackagedScript = {
  items: StackItem[];
  script: Uint8Array;
};

export type PipelineResult = PackagedScript & {
  circuit: R1csFile;
  files: WrittenArtifacts;
};

export class CheckZkpPipeline {
  readonly config: PipelineConfig;
  readonly profile: ProtocolProfile;
  private curve?: PairingCurve;
  private ownsCurve = false;

  /** A `curve` passed in stays open after `close()`; one loaded here does not */
  constructor(
    config: PipelineConfigInput,
    public readonly logger: Logger = silentLogger,
    public readonly verifier?: ArtifactVerifier,
    curve?: PairingCurve,
  ) {
    this.config = parseConfig(config);
    this.profile = getProtocolProfile(this.config.protocol);
    this.curve = curve;
  }

  private async ensureCurve(): Promise<PairingCurve> {
    if (!this.curve) {
      this.curve = await loadBls12381();
      this.ownsCurve = true;
    }
    return this.curve;
  }

  async close(): Promise<void> {
    if (this.curve && this.ownsCurve) {
      await this.curve.terminate();
      this.curve = undefined;
      this.ownsCurve = false;
    }
  }

  loadCircuit(): R1csFile {
    return readR1csFile(this.config.r1csPath, {
      layout: this.config.layout,
      limits: this.config.limits,
      logger: this.logger,
    });
  }

  /**
   * Build the witness for `publicInputs` and replay the circuit onto `cs`.
   * Violated constraints are logged, not thrown: the backend decides what an
   * unsatisfied circuit means.
   */
  synthesize<V>(
    cs: ConstraintSystem<V>,
    circuit: R1csFile,
    publicInputs: readonly bigint[],
    policy: AssignmentPolicy = zeroPolicy,
    modulus: bigint = BLS12_381_SCALAR_MODULUS,
  ): bigint[] {
    const witness = buildWitness(circuit.header, publicInputs, policy, modulus);
    const failing = findUnsatisfied(circuit.constraints, witness, modulus);
    if (failing.length > 0) {
      this.logger.warn(
        `witness violates ${failing.length} of ${circuit.constraints.length} constraints (first: ${failing[0]})`,
      );
    }
    synthesizeCircuit(cs, circuit, witnessAssignment(witness), {
      modulus,
      compat: this.config.compat,
      logger: this.logger,
    });
    return witness;
  }

  loadArtifacts(): LoadedArtifacts {
    const { proofPath, verifyingKeyPath, publicSignalsPath } = this.config;
    if (!proofPath || !verifyingKeyPath || !publicSignalsPath) {
      throw new ConfigurationError(
        "packaging needs proofPath, verifyingKeyPath and publicSignalsPath",
      );
    }

    const raw = {
      proof: parseSnarkjsProof(readJsonFile(proofPath)),
      verifyingKey: parseSnarkjsVerifyingKey(readJsonFile(verifyingKeyPath)),
      publicSignals: parseSnarkjsPublicSignals(readJsonFile(publicSignalsPath)),
    };
    this.logger.info(
      `loaded proof ${proofPath} with ${raw.publicSignals.length} public signals`,
    );

    return {
      raw,
      proof: proofFromSnarkjs(raw.proof),
      verifyingKey: verifyingKeyFromSnarkjs(raw.verifyingKey),
      publicInputs: publicInputsFromSnarkjs(raw.publicSignals),
    };
  }

  async verify(artifacts: LoadedArtifacts): Promise<void> {
    if (!this.verifier) {
      throw new ConfigurationError("verifyWithBackend is set but no backend was supplied");
    }
    const { verifyingKey, publicSignals, proof } = artifacts.raw;
    const ok = await this.verifier.verify(verifyingKey, publicSignals, proof);
    if (!ok) {
      throw new ProofVerificationError("proving backend rejected the proof");
    }
    this.logger.info("proof verified by the proving backend");
  }

  async package(
    proof: Groth16Proof,
    verifyingKey: Groth16VerifyingKey,
    publicInputs: readonly bigint[],
  ): Promise<PackagedScript> {
    const curve = await this.ensureCurve();
    const items = packageProof(proof, verifyingKey, publicInputs, curve, {
      profile: this.profile,
      chunkCountPolicy: this.config.chunkCountPolicy,
      logger: this.logger,
    });
    const script = assembleScript(items, this.profile);
    this.logger.info(`assembled ${items.length} pushes into a ${script.length} byte script`);
    return { items, script };
  }

  async run(): Promise<PipelineResult> {
    const circuit = this.loadCircuit();
    const artifacts = this.loadArtifacts();

    if (artifacts.publicInputs.length !== circuit.header.publicInputCount) {
      throw new BoundsError(
        `circuit has ${circuit.header.publicInputCount} public inputs, proof carries ${artifacts.publicInputs.length}`,
        {
          expected: circuit.header.publicInputCount,
          actual: artifacts.publicInputs.length,
        },
      );
    }
    if (this.config.verifyWithBackend) {
      await this.verify(artifacts);
    }

    try {
      const { items, script } = await this.package(
        artifacts.proof,
        artifacts.verifyingKey,
        artifacts.publicInputs,
      );
      const files = writeArtifacts(this.config.outDir, items, script);
      this.logger.info(`wrote ${files.items}, ${files.json} and ${files.script}`);
      return { circuit, items, script, files };
    } finally {
      await this.close();
    }
  }
}
