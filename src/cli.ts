import { parseArgs } from "node:util";

import type { Logger } from "winston";

import { toHex } from "./common/codecs.js";
import { IOError, LocatorError } from "./common/errors.js";
import { listOids } from "./common/oid-table.js";
import { loadEnvConfig } from "./config.js";
import type { ScanConfig } from "./config.js";
import { RULE, renderKeySize, renderValidation } from "./display/report.js";
import { renderTree } from "./display/tree-renderer.js";
import { estimateKeySize } from "./extract/key-size-estimator.js";
import { loadFile, saveToFile } from "./io/file-handler.js";
import { createLogger } from "./logger.js";
import { SignatureLocator } from "./locator/signature-locator.js";

export const USAGE = [
  "Usage: der-sigscan [options] <file_path>",
  "Search for ASN.1 structures (0x30 0x82) from end of file backwards",
  "Options:",
  "  -s, --save          save ASN.1 structure to file (default: signature.der)",
  "  -o, --output <file> output file to save the ASN.1 structure",
  "  -l, --list          list the supported OIDs",
  "  -h, --help          show this help",
].join("\n");

export interface CliIO {
  print: (line: string) => void;
  logger?: Logger;
  config?: ScanConfig;
}

interface CliArgs {
  filePath?: string;
  save: boolean;
  output?: string;
  list: boolean;
  help: boolean;
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function parseCliArgs(argv: string[]): CliArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      save: { type: "boolean", short: "s", default: false },
      output: { type: "string", short: "o" },
      list: { type: "boolean", short: "l", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
  if (positionals.length > 1) {
    throw new UsageError("please provide exactly one file path");
  }
  return {
    filePath: positionals[0],
    save: values.save ?? false,
    output: values.output,
    list: values.list ?? false,
    help: values.help ?? false,
  };
}

function printOidList(print: (line: string) => void): void {
  const oids = listOids();
  print("Supported OIDs:");
  for (const [oid, name] of oids) {
    print(`  ${oid.padEnd(28)} ${name}`);
  }
  print(`Total supported OIDs: ${oids.length}`);
}

async function scanFile(
  args: CliArgs & { filePath: string },
  io: Required<CliIO>,
): Promise<void> {
  const { print, config } = io;
  const data = await loadFile(args.filePath);

  print(`Analyzing file: ${args.filePath}`);
  print(RULE);

  const limits = {
    maxDepth: config.maxDepth,
    maxElementsPerLevel: config.maxElementsPerLevel,
  };
  const match = new SignatureLocator({ ...limits, logger: io.logger }).locate(
    data,
  );
  print(`Valid ASN.1 signature found at offset ${match.offset}`);
  print(`Structure size: ${match.fullBytes.length} bytes`);

  const keySize = estimateKeySize(match.fullBytes, limits);
  print(RULE);
  renderValidation(match.validation).forEach(print);
  print(RULE);

  const tree = renderTree(match.fullBytes, match.offset, limits);
  tree.lines.forEach(print);
  if (tree.error !== undefined) {
    print(`Error parsing ASN.1 structure: ${tree.error.message}`);
    print(`Raw data (hex): ${toHex(match.fullBytes)}`);
  }

  print(renderKeySize(keySize));
  print(RULE);

  if (args.save || args.output !== undefined) {
    const filename = args.output ?? config.outputFile;
    await saveToFile(match.fullBytes, filename);
    print(`ASN.1 structure saved to: ${filename}`);
  }
}

/**
 * Run the scanner over `argv` (without the node and script entries).
 * @returns The process exit code.
 */
export async function main(argv: string[], io: CliIO): Promise<number> {
  const config = io.config ?? loadEnvConfig();
  const logger = io.logger ?? createLogger(config.logLevel);
  const { print } = io;

  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    print(`Error: ${message}`);
    print(USAGE);
    return 1;
  }

  if (args.help) {
    print(USAGE);
    return 0;
  }
  if (args.list) {
    printOidList(print);
    return 0;
  }
  if (args.filePath === undefined) {
    print("Error: please provide exactly one file path");
    print(USAGE);
    return 1;
  }

  try {
    await scanFile({ ...args, filePath: args.filePath }, { print, logger, config });
    return 0;
  } catch (e) {
    if (e instanceof LocatorError || e instanceof IOError) {
      logger.log("error", `${e.name} ${e.code}: ${e.message}`);
      print(`Error: ${e.message}`);
      return 1;
    }
    throw e;
  }
}
