import { BoundsError } from "../errors";
import { BLS12_381_SCALAR_MODULUS, mod } from "../field";
import type {
  Constraint,
  FileHeader,
  R1csFile,
  SparseLinearCombination,
} from "../r1cs/types";
import type { WireAssignment } from "./builder";

/** Assigns private wires; wire 0 and the public wires are never asked for */
export type AssignmentPolicy = (wireIndex: number) => bigint;

export const zeroPolicy: AssignmentPolicy = () => 0n;

export function valuesPolicy(
  values: ReadonlyMap<number, bigint>,
  fallback: AssignmentPolicy = zeroPolicy,
): AssignmentPolicy {
  return (i) => values.get(i) ?? fallback(i);
}

export function embeddedWitnessPolicy(file: R1csFile): AssignmentPolicy {
  const witness = file.embeddedWitness;
  if (!witness) {
    throw new BoundsError("container carries no embedded witness");
  }
  return (i) => {
    const value = witness[i];
    if (value === undefined) {
      throw new BoundsError(`embedded witness has no value for wire ${i}`, { wire: i });
    }
    return value;
  };
}

/**
 * Dense witness for one proving run: `w[0] = 1`, then the public inputs,
 * then whatever the policy assigns to the private wires.
 */
export function buildWitness(
  header: Pick<FileHeader, "totalWireCount" | "publicInputCount">,
  publicInputs: readonly bigint[],
  policy: AssignmentPolicy = zeroPolicy,
  modulus: bigint = BLS12_381_SCALAR_MODULUS,
): bigint[] {
  const { totalWireCount, publicInputCount } = header;
  if (publicInputs.length !== publicInputCount) {
    throw new BoundsError(
      `circuit expects ${publicInputCount} public inputs, got ${publicInputs.length}`,
      { expected: publicInputCount, actual: publicInputs.length },
    );
  }

  const witness = [1n, ...publicInputs.map((v) => mod(v, modulus))];
  for (let i = publicInputCount + 1; i < totalWireCount; i++) {
    witness.push(mod(policy(i), modulus));
  }
  return witness;
}

export function witnessAssignment(witness: readonly bigint[]): WireAssignment {
  return (i) => {
    const value = witness[i];
    if (value === undefined) {
      throw new BoundsError(`witness has no value for wire ${i}`, { wire: i });
    }
    return value;
  };
}

export function evaluateLinearCombination(
  lc: SparseLinearCombination,
  witness: readonly bigint[],
  modulus: bigint = BLS12_381_SCALAR_MODULUS,
): bigint {
  let acc = 0n;
  for (const { wireIndex, coefficient } of lc) {
    const value = witness[wireIndex];
    if (value === undefined) {
      throw new BoundsError(`wire ${wireIndex} is outside the witness`, { wire: wireIndex });
    }
    acc = mod(acc + coefficient * value, modulus);
  }
  return acc;
}

export interface ConstraintEvaluation {
  a: bigint;
  b: bigint;
  c: bigint;
  satisfied: boolean;
}

export function evaluateConstraint(
  constraint: Constraint,
  witness: readonly bigint[],
  modulus: bigint = BLS12_381_SCALAR_MODULUS,
): ConstraintEvaluation {
  const a = evaluateLinearCombination(constraint.a, witness, modulus);
  // an empty B encodes the constant 1
  const b =
    constraint.b.length === 0 ? 1n : evaluateLinearCombination(constraint.b, witness, modulus);
  const c = evaluateLinearCombination(constraint.c, witness, modulus);
  return { a, b, c, satisfied: mod(a * b, modulus) === c };
}

/** Indices of the constraints the witness violates, in file order */
export function findUnsatisfied(
  constraints: readonly Constraint[],
  witness: readonly bigint[],
  modulus: bigint = BLS12_381_SCALAR_MODULUS,
): number[] {
  const failing: number[] = [];
  for (const [i, constraint] of constraints.entries()) {
    if (!evaluateConstraint(constraint, witness, modulus).satisfied) {
      failing.push(i);
    }
  }
  return failing;
}
