import { BoundsError, FormatError, WireReferenceError } from "../errors";
import { BLS12_381_SCALAR_MODULUS, mod } from "../field";
import { silentLogger, type Logger } from "../logger";
import type {
  Constraint,
  FileHeader,
  Matrix,
  SparseLinearCombination,
} from "../r1cs/types";
import type { ConstraintSystem, LinearExpression } from "./constraint-system";

/** Value of a wire for one proving run */
export type WireAssignment = (wireIndex: number) => bigint;

/** Opt-in behaviours of older tooling. Off by default and logged on every use. */
export interface CompatibilityOptions {
  /** Point out-of-range wire references at the constant wire instead of failing */
  redirectOutOfRangeWires: boolean;
}

export const DEFAULT_COMPAT: CompatibilityOptions = {
  redirectOutOfRangeWires: false,
};

export interface SynthesisOptions {
  /** Field the backend works over */
  modulus?: bigint;
  compat?: Partial<CompatibilityOptions>;
  logger?: Logger;
}

export interface CircuitDescription {
  header: Pick<FileHeader, "totalWireCount" | "publicInputCount" | "prime">;
  constraints: readonly Constraint[];
}

/**
 * Allocate one variable per wire and assert every constraint, in file order,
 * on `cs`. Wire 0 is the backend's constant, wires `1..=publicInputCount`
 * are public inputs and the rest private witnesses. An empty B combination
 * is the constant 1; empty A and C combinations are 0.
 */
export function synthesizeCircuit<V>(
  cs: ConstraintSystem<V>,
  circuit: CircuitDescription,
  assignment: WireAssignment,
  options: SynthesisOptions = {},
): void {
  const modulus = options.modulus ?? BLS12_381_SCALAR_MODULUS;
  const compat = { ...DEFAULT_COMPAT, ...options.compat };
  const logger = options.logger ?? silentLogger;
  const { totalWireCount, publicInputCount, prime } = circuit.header;

  if (prime !== undefined && prime !== modulus) {
    throw new FormatError(
      `circuit was compiled over a field (0x${prime.toString(16)}) the backend does not use`,
      { prime, modulus },
    );
  }
  if (totalWireCount < 1 || publicInputCount > totalWireCount - 1) {
    throw new BoundsError(
      `cannot allocate ${publicInputCount} public inputs among ${totalWireCount} wires`,
      { totalWireCount, publicInputCount },
    );
  }

  const variables: V[] = [cs.one];
  for (let wire = 1; wire <= publicInputCount; wire++) {
    variables.push(cs.allocateInput(() => assignment(wire)));
  }
  for (let wire = publicInputCount + 1; wire < totalWireCount; wire++) {
    variables.push(cs.allocateWitness(() => assignment(wire)));
  }
  logger.debug(
    `allocated ${publicInputCount} public inputs and ${totalWireCount - 1 - publicInputCount} witnesses`,
  );

  const expression = (
    lc: SparseLinearCombination,
    constraintIndex: number,
    matrix: Matrix,
  ): LinearExpression<V> =>
    lc.map(({ wireIndex, coefficient }, termIndex) => {
      const variable = variables[wireIndex];
      if (variable !== undefined) {
        return [mod(coefficient, modulus), variable];
      }
      const where = `constraint ${constraintIndex} ${matrix.toUpperCase()} term ${termIndex}`;
      if (!compat.redirectOutOfRangeWires) {
        throw new WireReferenceError(
          `${where} references wire ${wireIndex}, only ${variables.length} wires are allocated`,
          { constraint: constraintIndex, matrix, term: termIndex, wireIndex },
        );
      }
      logger.warn(`${where}: wire ${wireIndex} is out of range, redirecting to the constant wire`);
      return [mod(coefficient, modulus), cs.one];
    });

  for (const [i, constraint] of circuit.constraints.entries()) {
    const a = expression(constraint.a, i, "a");
    const b: LinearExpression<V> =
      constraint.b.length === 0 ? [[1n, cs.one]] : expression(constraint.b, i, "b");
    const c = expression(constraint.c, i, "c");
    cs.enforce(a, b, c);
  }
  logger.debug(`enforced ${circuit.constraints.length} constraints`);
}
