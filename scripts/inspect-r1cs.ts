#!/usr/bin/env tsx
import { Command, Option } from "commander";
import {
  CheckZkpError,
  InMemoryConstraintSystem,
  LOG_LEVELS,
  createConsoleLogger,
  embeddedWitnessPolicy,
  findUnsatisfied,
  buildWitness,
  logLevelFromEnv,
  readR1csFile,
  synthesizeCircuit,
  type LogLevel,
  type R1csFile,
} from "../src";

type InspectOptions = {
  layout: "sectioned" | "flat";
  constraints: boolean;
  logLevel: LogLevel;
};

const program = new Command();
program
  .description("Print the header of an R1CS container and check its embedded witness")
  .argument("<r1csFile>", "R1CS container to inspect")
  .addOption(
    new Option("--layout <layout>", "Container layout").choices(["sectioned", "flat"]).default("sectioned"),
  )
  .option("--constraints", "Also print every constraint", false)
  .addOption(
    new Option("--log-level <level>", "Log verbosity").choices(LOG_LEVELS).default(logLevelFromEnv("warn")),
  );

program.parse();
const [path] = program.args;
const opts = program.opts<InspectOptions>();
const logger = createConsoleLogger(opts.logLevel);

function describe(file: R1csFile) {
  const { header } = file;
  console.log(`layout:            ${header.layout}`);
  console.log(`curve:             ${header.curve}`);
  console.log(`field size:        ${header.fieldElementSize} bytes`);
  console.log(`wires:             ${header.totalWireCount}`);
  console.log(`public inputs:     ${header.publicInputCount}`);
  console.log(`private inputs:    ${header.privateInputCount}`);
  console.log(`constraints:       ${header.constraintCount}`);

  if (opts.constraints) {
    const lc = (terms: R1csFile["constraints"][number]["a"]) =>
      terms.length === 0
        ? "0"
        : terms.map((t) => `${t.coefficient}*w${t.wireIndex}`).join(" + ");
    for (const [i, c] of file.constraints.entries()) {
      console.log(`  ${i}: (${lc(c.a)}) * (${c.b.length === 0 ? "1" : lc(c.b)}) = ${lc(c.c)}`);
    }
  }

  if (file.embeddedWitness) {
    const witness = file.embeddedWitness;
    const publicInputs = witness.slice(1, header.publicInputCount + 1);
    const full = buildWitness(header, publicInputs, embeddedWitnessPolicy(file), header.prime);
    const failing = findUnsatisfied(file.constraints, full, header.prime);
    console.log(
      failing.length === 0
        ? "embedded witness: satisfies every constraint"
        : `embedded witness: violates constraints ${failing.join(", ")}`,
    );
  }
}

try {
  if (!path) throw new Error("missing R1CS file argument");
  const file = readR1csFile(path, { layout: opts.layout, logger });
  describe(file);
  const cs = new InMemoryConstraintSystem("setup", file.header.prime);
  synthesizeCircuit(cs, file, () => 0n, { modulus: file.header.prime, logger });
  console.log(
    `synthesized:       ${cs.numInstanceVariables} instance / ${cs.numWitnessVariables} witness variables, ` +
      `${cs.numConstraints} constraints`,
  );
} catch (err) {
  if (!(err instanceof CheckZkpError)) throw err;
  logger.error(`${err.code}: ${err.message}`);
  process.exitCode = 1;
}
