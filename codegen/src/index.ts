#!/usr/bin/env node

/**
 * GraphQL schema codegen CLI
 *
 * Generates a TypeScript module of client type declarations from a GraphQL
 * introspection result (or an SDL schema).
 *
 * Usage:
 *   gql-schema-codegen schema.json
 *
 * With explicit paths and options:
 *   gql-schema-codegen ./schema.json ./src/github.ts \
 *     --schema-name github \
 *     --runtime-module @acme/gql-runtime
 *
 * Reads stdin when no input is given and then writes to stdout. Otherwise the
 * output defaults to "<schema name>.ts" next to the input file. The schema
 * name defaults to the output (or input) basename, cleaned up to a valid
 * identifier.
 */

import * as fs from "node:fs";
import * as path from "node:path";

import { DEFAULT_RUNTIME_MODULE, emitTypeScript } from "./emitters/typescript.js";
import { CodegenError } from "./errors.js";
import { cleanupSchemaName, schemaNameFromPaths } from "./naming.js";
import { detectFormat, parseSchemaSource, SchemaFormat } from "./parser.js";

interface CliArgs {
  input?: string; // stdin when absent
  output?: string;
  schemaName?: string;
  runtimeModule: string;
  format?: SchemaFormat;
}

const USAGE = `Usage: gql-schema-codegen [schema.json] [output.ts] [options]

Options:
  -s, --schema-name <name>    name of the exported schema object
  --runtime-module <module>   module the declarations import (default: ${DEFAULT_RUNTIME_MODULE})
  --format <json|sdl>         input format (default: from the file extension)
  -h, --help                  show this help`;

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {
    runtimeModule: DEFAULT_RUNTIME_MODULE,
  };
  const positional: string[] = [];

  const value = (i: number): string => {
    const v = argv[i];
    if (v === undefined) {
      console.error(`Error: ${argv[i - 1]} requires a value`);
      process.exit(1);
    }
    return v;
  };

  let i = 0;
  while (i < argv.length) {
    switch (argv[i]) {
      case "-s":
      case "--schema-name":
        args.schemaName = value(++i);
        break;
      case "--runtime-module":
        args.runtimeModule = value(++i);
        break;
      case "--format": {
        const format = value(++i);
        if (format !== "json" && format !== "sdl") {
          console.error(`Error: --format must be "json" or "sdl", got "${format}"`);
          process.exit(1);
        }
        args.format = format;
        break;
      }
      case "-h":
      case "--help":
        console.log(USAGE);
        process.exit(0);
      default:
        if (argv[i].startsWith("-") && argv[i] !== "-") {
          console.error(`Unknown option: ${argv[i]}`);
          process.exit(1);
        }
        positional.push(argv[i]);
    }
    i++;
  }

  if (positional.length > 2) {
    console.error(`Error: unexpected argument "${positional[2]}"\n\n${USAGE}`);
    process.exit(1);
  }

  // "-" stands for stdin / stdout
  const [input, output] = positional.map((p) => (p === "-" ? undefined : p));
  args.input = input;
  args.output = output;
  return args;
}

function main() {
  const args = parseArgs(process.argv.slice(2));

  const schemaName =
    cleanupSchemaName(
      args.schemaName ?? schemaNameFromPaths(args.output, args.input)
    ) || "generated_schema";

  const source = fs.readFileSync(args.input ?? 0, "utf-8");
  const schemaModel = parseSchemaSource(
    source,
    args.format ?? detectFormat(args.input)
  );

  // Generate everything before touching the output file
  const output = emitTypeScript(schemaModel, {
    schemaName,
    runtimeModule: args.runtimeModule,
  });

  let outputPath = args.output;
  if (!outputPath && args.input) {
    outputPath = path.join(path.dirname(args.input), `${schemaName}.ts`);
    console.log(`Writing to: ${outputPath}`);
  }

  if (outputPath) {
    fs.writeFileSync(outputPath, output);
    console.log(`Generated ${outputPath}`);
  } else {
    process.stdout.write(output);
  }
}

try {
  main();
} catch (err) {
  if (err instanceof CodegenError) {
    console.error(`Error: ${err.message}`);
    process.exit(1);
  }
  throw err;
}
