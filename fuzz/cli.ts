import fs from "node:fs";
import path from "node:path";
import { parseArgs } from "node:util";
import { fileURLToPath } from "node:url";

import { checkSplitInvariance, SplitMismatchError } from "./check.ts";
import { mutateBuffer } from "./mutate.ts";
import { XorShift32 } from "./rng.ts";
import { targets } from "./targets/index.ts";

const FUZZ_DIR = path.dirname(fileURLToPath(import.meta.url));
const DEFAULT_ITERATIONS = 100_000;
const MAX_CORPUS = 512;

function usage(): string {
  const lines = Object.values(targets).map((t) => `  ${t.name.padEnd(16)} ${t.description}`);
  return (
    "usage: npm run fuzz -- <target> [--iterations N] [--seed N] [--max-len N] [--replay FILE]\n\n" +
    "Each input is decoded whole and again split at random offsets; a differing\n" +
    "outcome or a thrown error is saved under fuzz/failures/<target>/.\n\n" +
    `targets:\n${lines.join("\n")}\n`
  );
}

function positiveInt(raw: string | undefined, flag: string, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < 0) throw new Error(`${flag} expects a non-negative integer, got ${raw}`);
  return value;
}

function saveFailure(target: string, input: Buffer, seed: number, iteration: number): string {
  const dir = path.join(FUZZ_DIR, "failures", target);
  fs.mkdirSync(dir, { recursive: true });
  const file = path.join(dir, `seed${seed}-iter${iteration}.bin`);
  fs.writeFileSync(file, input);
  return file;
}

function report(histogram: Map<string, number>): string {
  return [...histogram]
    .sort((a, b) => b[1] - a[1])
    .map(([label, count]) => `  ${label.padEnd(28)} ${count}`)
    .join("\n");
}

function main(): number {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      iterations: { type: "string" },
      seed: { type: "string" },
      "max-len": { type: "string" },
      replay: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });

  const name = positionals[0];
  if (values.help || name === undefined) {
    process.stderr.write(usage());
    return values.help ? 0 : 2;
  }
  const target = targets[name];
  if (!target) {
    process.stderr.write(`unknown target ${name}\n\n${usage()}`);
    return 2;
  }

  const seed = positiveInt(values.seed, "--seed", 1);
  const rng = new XorShift32(seed);

  if (values.replay !== undefined) {
    const outcome = checkSplitInvariance(target, fs.readFileSync(values.replay), rng);
    process.stdout.write(`${target.name}: ${outcome.label} ${outcome.detail}\n`);
    return 0;
  }

  const iterations = positiveInt(values.iterations, "--iterations", DEFAULT_ITERATIONS);
  const maxLen = positiveInt(values["max-len"], "--max-len", target.maxLen);
  const corpus = target.seeds.map((s) => Buffer.from(s));
  const histogram = new Map<string, number>();

  for (let i = 0; i < iterations; i++) {
    const input = mutateBuffer(corpus[rng.int(0, corpus.length - 1)]!, rng, { maxLen });
    let label: string;
    try {
      label = checkSplitInvariance(target, input, rng).label;
    } catch (err) {
      const file = saveFailure(target.name, input, seed, i);
      const message = err instanceof SplitMismatchError ? err.message : err instanceof Error ? (err.stack ?? err.message) : String(err);
      process.stderr.write(`\n${target.name}: failure at iteration ${i} (seed ${seed})\n${message}\nsaved ${file}\n`);
      return 1;
    }

    // a label not seen before marks an input worth mutating further
    const seen = histogram.get(label) ?? 0;
    histogram.set(label, seen + 1);
    if (seen === 0 && corpus.length < MAX_CORPUS) corpus.push(input);
  }

  process.stdout.write(`${target.name}: ${iterations} inputs, seed ${seed}, corpus ${corpus.length}\n${report(histogram)}\n`);
  return 0;
}

try {
  process.exitCode = main();
} catch (err) {
  process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
  process.exitCode = 2;
}
