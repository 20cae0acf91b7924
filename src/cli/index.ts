#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import { type CompilerOptions, YulCompiler } from "../compiler/index.js";

type OutputKind = "bin" | "asm" | "opcodes" | "print";

interface Options {
  input: string | null;
  output: string | null;
  outputs: OutputKind[];
  verbose: boolean;
  optimize: boolean;
  stackOpt: boolean;
  namedLabels: boolean;
}

function parseArgs(argv: string[]): Options {
  const opts: Options = {
    input: null,
    output: null,
    outputs: [],
    verbose: false,
    optimize: false,
    stackOpt: true,
    namedLabels: false,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "-o" || arg === "--output") {
      const value = argv[i + 1];
      if (!value) throw new Error("Missing value for -o/--output");
      opts.output = value;
      i += 1;
      continue;
    }
    if (arg === "-v" || arg === "--verbose") {
      opts.verbose = true;
      continue;
    }
    if (arg === "--optimize") {
      opts.optimize = true;
      continue;
    }
    if (arg === "--no-stack-opt") {
      opts.stackOpt = false;
      continue;
    }
    if (arg === "--named-labels") {
      opts.namedLabels = true;
      continue;
    }
    if (arg === "--bin" || arg === "--asm" || arg === "--opcodes" || arg === "--print") {
      const kind = arg.slice(2);
      if (kind === "bin" || kind === "asm" || kind === "opcodes" || kind === "print") {
        opts.outputs.push(kind);
      }
      continue;
    }
    if (arg === "-h" || arg === "--help") {
      printHelp();
      process.exit(0);
    }
    if (!arg.startsWith("-")) {
      if (opts.input !== null) throw new Error(`Only one input file is supported: ${arg}`);
      opts.input = arg;
      continue;
    }
    throw new Error(`Unknown option: ${arg}`);
  }

  if (opts.outputs.length === 0) opts.outputs.push("bin");
  return opts;
}

function printHelp(): void {
  console.log(`Usage: evm-stack-codegen [options] <file.yul>

Options:
  --optimize            Forward storage/memory loads before code generation
  --no-stack-opt        Keep every variable in its slot until its block ends
  --named-labels        Name function entry labels after the function
  --bin                 Print bytecode as hex (default)
  --asm                 Print the assembly listing
  --opcodes             Print the opcode listing
  --print               Print the (optimized) source
  -o, --output <file>   Write output to a file instead of stdout
  -v, --verbose         Verbose logging
  -h, --help            Show this help

Examples:
  evm-stack-codegen contract.yul
  evm-stack-codegen --optimize --asm --opcodes contract.yul -o out.txt
`);
}

async function main() {
  const opts = parseArgs(process.argv.slice(2));

  if (opts.input === null) {
    printHelp();
    process.exit(1);
  }

  const resolvedInput = path.resolve(opts.input);
  if (!fs.existsSync(resolvedInput)) {
    console.error(`Input not found: ${resolvedInput}`);
    process.exitCode = 1;
    return;
  }

  if (opts.verbose) {
    console.log(`Compiling ${resolvedInput}`);
  }

  const options: CompilerOptions = {
    optimize: opts.optimize,
    optimizeStackAllocation: opts.stackOpt,
    useNamedLabelsForFunctions: opts.namedLabels,
    sourceName: path.basename(resolvedInput),
    verbose: opts.verbose,
  };

  const source = fs.readFileSync(resolvedInput, "utf8");
  const result = new YulCompiler().compile(source, options);
  if (!result.success) {
    for (const diagnostic of result.diagnostics) {
      console.error(diagnostic.format());
    }
    process.exitCode = 1;
    return;
  }

  const sections = opts.outputs.map((kind) => {
    switch (kind) {
      case "bin":
        return result.output.bytecodeHex;
      case "asm":
        return result.output.assembly;
      case "opcodes":
        return result.output.opcodes.trimEnd();
      case "print":
        return result.output.source;
    }
  });
  const text = `${sections.join("\n\n")}\n`;

  if (opts.output) {
    const outPath = path.resolve(opts.output);
    fs.mkdirSync(path.dirname(outPath), { recursive: true });
    fs.writeFileSync(outPath, text);
    if (opts.verbose) {
      console.log(`Generated: ${outPath}`);
    }
  } else {
    process.stdout.write(text);
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
