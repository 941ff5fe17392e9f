#!/usr/bin/env tsx
import { Command, Option } from "commander";
import {
  CheckZkpError,
  CheckZkpPipeline,
  LOG_LEVELS,
  SnarkjsGroth16Backend,
  createConsoleLogger,
  logLevelFromEnv,
  parseConfig,
  type LogLevel,
} from "../src";

type PackageProofOptions = {
  r1cs: string;
  proof: string;
  vkey: string;
  public: string;
  out: string;
  layout: "sectioned" | "flat";
  padChunks: boolean;
  verify: boolean;
  logLevel: LogLevel;
};

const program = new Command();
program
  .description("Package a Groth16 proof into OP_CHECKZKP stack items and a script")
  .requiredOption("--r1cs <file>", "R1CS container of the circuit")
  .requiredOption("--proof <file>", "snarkjs proof.json")
  .requiredOption("--vkey <file>", "snarkjs verification_key.json")
  .requiredOption("--public <file>", "snarkjs public.json")
  .option("--out <dir>", "Directory for stack_items.txt, stack_items.json and script.hex", ".")
  .addOption(
    new Option("--layout <layout>", "Container layout").choices(["sectioned", "flat"]).default("sectioned"),
  )
  .option("--pad-chunks", "Zero-pad a short verifying key to the chunk count instead of failing", false)
  .option("--verify", "Check the proof with snarkjs before packaging", false)
  .addOption(
    new Option("--log-level <level>", "Log verbosity").choices(LOG_LEVELS).default(logLevelFromEnv()),
  );

program.parse();
const opts = program.opts<PackageProofOptions>();
const logger = createConsoleLogger(opts.logLevel);

try {
  const config = parseConfig({
    r1csPath: opts.r1cs,
    proofPath: opts.proof,
    verifyingKeyPath: opts.vkey,
    publicSignalsPath: opts.public,
    outDir: opts.out,
    layout: opts.layout,
    chunkCountPolicy: opts.padChunks ? "pad" : "strict",
    verifyWithBackend: opts.verify,
  });
  const pipeline = new CheckZkpPipeline(config, logger, new SnarkjsGroth16Backend({}, logger));
  const { files } = await pipeline.run();
  console.log(files.script);
} catch (err) {
  if (!(err instanceof CheckZkpError)) throw err;
  logger.error(`${err.code}: ${err.message}`);
  process.exitCode = 1;
}
