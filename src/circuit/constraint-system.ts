import { BLS12_381_SCALAR_MODULUS, mod } from "../field";

/** `Σ coefficient × variable` */
export type LinearExpression<V> = Array<[coefficient: bigint, variable: V]>;

/**
 * What the circuit builder needs from a proving backend: one shared constant,
 * variable allocation and multiplicative constraints `a · b = c`.
 */
export interface ConstraintSystem<V> {
  readonly one: V;
  allocateInput(value: () => bigint): V;
  allocateWitness(value: () => bigint): V;
  enforce(a: LinearExpression<V>, b: LinearExpression<V>, c: LinearExpression<V>): void;
}

export type SynthesisMode = "setup" | "prove";

export type VariableKind = "one" | "input" | "witness";

export interface Variable {
  kind: VariableKind;
  /** Position among variables of the same kind; the constant is input 0 */
  index: number;
}

export interface RecordedConstraint {
  a: LinearExpression<Variable>;
  b: LinearExpression<Variable>;
  c: LinearExpression<Variable>;
}

/**
 * In-process constraint system over a prime field. In `prove` mode every
 * value closure runs at allocation time; in `setup` mode none ever runs and
 * only the shape of the circuit is recorded.
 */
export class InMemoryConstraintSystem implements ConstraintSystem<Variable> {
  readonly one: Variable = { kind: "one", index: 0 };
  readonly constraints: RecordedConstraint[] = [];

  private readonly inputValues: bigint[] = [1n];
  private readonly witnessValues: bigint[] = [];
  private inputs = 1;
  private witnesses = 0;

  constructor(
    readonly mode: SynthesisMode = "prove",
    readonly modulus: bigint = BLS12_381_SCALAR_MODULUS,
  ) {}

  get numInstanceVariables(): number {
    return this.inputs;
  }

  get numWitnessVariables(): number {
    return this.witnesses;
  }

  get numConstraints(): number {
    return this.constraints.length;
  }

  allocateInput(value: () => bigint): Variable {
    if (this.mode === "prove") this.inputValues.push(mod(value(), this.modulus));
    return { kind: "input", index: this.inputs++ };
  }

  allocateWitness(value: () => bigint): Variable {
    if (this.mode === "prove") this.witnessValues.push(mod(value(), this.modulus));
    return { kind: "witness", index: this.witnesses++ };
  }

  enforce(
    a: LinearExpression<Variable>,
    b: LinearExpression<Variable>,
    c: LinearExpression<Variable>,
  ): void {
    this.constraints.push({ a, b, c });
  }

  /** Public values, starting with the constant one */
  get instanceAssignment(): readonly bigint[] {
    this.assertProving();
    return this.inputValues;
  }

  get witnessAssignment(): readonly bigint[] {
    this.assertProving();
    return this.witnessValues;
  }

  valueOf(variable: Variable): bigint {
    this.assertProving();
    const value =
      variable.kind === "witness"
        ? this.witnessValues[variable.index]
        : this.inputValues[variable.index];
    if (value === undefined) {
      throw new RangeError(`unallocated ${variable.kind} variable ${variable.index}`);
    }
    return value;
  }

  evaluate(expression: LinearExpression<Variable>): bigint {
    let acc = 0n;
    for (const [coefficient, variable] of expression) {
      acc = mod(acc + coefficient * this.valueOf(variable), this.modulus);
    }
    return acc;
  }

  /** Index of the first constraint the assignment violates */
  whichIsUnsatisfied(): number | undefined {
    for (const [i, { a, b, c }] of this.constraints.entries()) {
      if (mod(this.evaluate(a) * this.evaluate(b), this.modulus) !== this.evaluate(c)) {
        return i;
      }
    }
    return undefined;
  }

  isSatisfied(): boolean {
    return this.whichIsUnsatisfied() === undefined;
  }

  private assertProving(): void {
    if (this.mode !== "prove") {
      throw new Error("assignments are not available in setup mode");
    }
  }
}
