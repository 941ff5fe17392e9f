import * as snarkjs from "snarkjs";
import { ConfigurationError } from "../errors";
import { silentLogger, type Logger } from "../logger";
import {
  parseSnarkjsProof,
  parseSnarkjsPublicSignals,
  parseSnarkjsVerifyingKey,
  type SnarkjsProof,
  type SnarkjsPublicSignals,
  type SnarkjsVerifyingKey,
} from "../proof/artifacts";

export type ProofAndSignals<P, S> = {
  proof: P;
  publicSignals: S;
};

/**
 * Contract of an external proving backend. Only its serializable outputs
 * are consumed; the key and proof internals stay opaque.
 */
export interface ProvingBackend<C, PK, VK, P, S> {
  setup(circuit: C): Promise<{ provingKey: PK; verifyingKey: VK }>;
  prove(provingKey: PK, circuit: C): Promise<ProofAndSignals<P, S>>;
  verify(verifyingKey: VK, publicSignals: S, proof: P): Promise<boolean>;
}

export interface SnarkjsCircuit {
  r1csPath: string;
  /** Witness generator compiled alongside the R1CS */
  wasmPath?: string;
  inputs?: snarkjs.CircuitSignals;
}

export interface SnarkjsKeyPaths {
  /** Where setup writes the proving key */
  zkeyPath?: string;
  ptauPath?: string;
}

/**
 * Groth16 over snarkjs. Setup writes the proving key to `zkeyPath` from a
 * powers-of-tau file; proving randomness stays inside snarkjs. Verifying
 * needs neither path.
 */
export class SnarkjsGroth16Backend
  implements
    ProvingBackend<SnarkjsCircuit, string, SnarkjsVerifyingKey, SnarkjsProof, SnarkjsPublicSignals>
{
  constructor(
    public readonly paths: SnarkjsKeyPaths = {},
    private readonly logger: Logger = silentLogger,
  ) {}

  async setup(circuit: SnarkjsCircuit) {
    const { zkeyPath, ptauPath } = this.paths;
    if (!zkeyPath || !ptauPath) {
      throw new ConfigurationError("Groth16 setup needs a powers-of-tau file and a zkey output path");
    }
    await snarkjs.zKey.newZKey(circuit.r1csPath, ptauPath, zkeyPath, this.logger);
    const verifyingKey = parseSnarkjsVerifyingKey(
      await snarkjs.zKey.exportVerificationKey(zkeyPath, this.logger),
    );
    return { provingKey: zkeyPath, verifyingKey };
  }

  async prove(
    provingKey: string,
    circuit: SnarkjsCircuit,
  ): Promise<ProofAndSignals<SnarkjsProof, SnarkjsPublicSignals>> {
    if (!circuit.wasmPath || !circuit.inputs) {
      throw new ConfigurationError("proving needs the circuit's wasm witness generator and inputs");
    }
    const { proof, publicSignals } = await snarkjs.groth16.fullProve(
      circuit.inputs,
      circuit.wasmPath,
      provingKey,
      this.logger,
    );
    return {
      proof: parseSnarkjsProof(proof),
      publicSignals: parseSnarkjsPublicSignals(publicSignals),
    };
  }

  async verify(
    verifyingKey: SnarkjsVerifyingKey,
    publicSignals: SnarkjsPublicSignals,
    proof: SnarkjsProof,
  ): Promise<boolean> {
    return snarkjs.groth16.verify(verifyingKey, publicSignals, proof, this.logger);
  }
}
