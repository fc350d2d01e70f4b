/**
 * Merge parameter files given on the command line.
 *
 * Files are merged in the order given: the first is the baseline, each later
 * file overrides the ones before it.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { Command } from "commander";
import { isParameterFormat, serializeParameters } from "../../merge/codec.js";
import { ParameterMerger, provenanceToValue } from "../../merge/merger.js";
import type {
  IParameterMerger,
  MergeOptions,
  ParameterSource,
  ProvenanceLedger,
} from "../../merge/types.js";
import { mappingValue, stringValue, type StructuredValue } from "../../merge/value.js";
import { errors } from "../../strings/index.js";
import { EXIT_CODES } from "../exit-codes.js";
import {
  error,
  failCommand,
  formatProvenanceTable,
  isJsonMode,
  success,
  warn,
} from "../output.js";

export interface MergeFilesOptions extends Omit<MergeOptions, "onWarning"> {
  /** Track which file supplied each leaf */
  provenance?: boolean;
}

export interface MergeFilesResult {
  mergedContent: string;
  provenance?: ProvenanceLedger;
}

interface MergeCommandOptions {
  format: string;
  includeComments?: boolean;
  strictRoot?: boolean;
  provenance?: boolean;
  output?: string;
}

/**
 * Scope name of a file given on the command line: its base name without
 * extension ("overrides/prod.yaml" -> "prod").
 */
export function fileScopeName(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

/**
 * Read files as parameter sources; precedence is the position in the list.
 */
export async function readParameterFiles(files: string[]): Promise<ParameterSource[]> {
  return Promise.all(
    files.map(async (filePath, index) => {
      let content: string;
      try {
        content = await fs.readFile(filePath, "utf-8");
      } catch (err) {
        throw new Error(
          errors.failures.readFile(filePath, err instanceof Error ? err.message : String(err)),
          { cause: err },
        );
      }
      return { scopeName: fileScopeName(filePath), precedence: index, content };
    }),
  );
}

/**
 * Merge files in the order given. Sources that contribute nothing are
 * reported through `warn`.
 */
export async function mergeFiles(
  files: string[],
  options: MergeFilesOptions = {},
  merger: IParameterMerger = new ParameterMerger(),
): Promise<MergeFilesResult> {
  const sources = await readParameterFiles(files);
  const mergeOptions: MergeOptions = {
    outputFormat: options.outputFormat,
    includeComments: options.includeComments,
    strictRoot: options.strictRoot,
    onWarning: (warning) => warn(`${files[warning.sourceIndex]}: ${warning.message}`),
  };

  if (options.provenance) {
    return merger.mergeWithProvenance(sources, mergeOptions);
  }
  return { mergedContent: merger.merge(sources.map((source) => source.content), mergeOptions) };
}

/**
 * Print a merge result, or write its content to `outputPath`.
 *
 * JSON mode prints `{ mergedContent, provenance? }` (or `{ output, provenance? }`
 * when the content went to a file).
 */
export async function emitMergeResult(result: MergeFilesResult, outputPath?: string): Promise<void> {
  if (outputPath) {
    try {
      await fs.writeFile(outputPath, result.mergedContent, "utf-8");
    } catch (err) {
      throw new Error(
        errors.failures.writeOutput(outputPath, err instanceof Error ? err.message : String(err)),
        { cause: err },
      );
    }
  }

  if (isJsonMode()) {
    const entries: [string, StructuredValue][] = outputPath
      ? [["output", stringValue(outputPath)]]
      : [["mergedContent", stringValue(result.mergedContent)]];
    if (result.provenance) {
      entries.push(["provenance", provenanceToValue(result.provenance)]);
    }
    console.log(serializeParameters(mappingValue(entries), "json"));
    return;
  }

  if (outputPath) {
    success(`Wrote merged parameters to ${outputPath}`);
  } else {
    console.log(result.mergedContent.replace(/\n$/, ""));
  }

  if (result.provenance) {
    console.log("");
    console.log(formatProvenanceTable(result.provenance));
  }
}

export function registerMergeCommand(program: Command): void {
  program
    .command("merge [files...]")
    .description("Merge parameter files, later files overriding earlier ones")
    .option("-f, --format <format>", "Output format (yaml or json)", "yaml")
    .option("--include-comments", "Accepted for compatibility; has no effect")
    .option("--strict-root", "Fail when a file's root is not a mapping")
    .option("--provenance", "Show which file supplied each overriding value")
    .option("-o, --output <file>", "Write merged parameters to a file")
    .action(async (files: string[], options: MergeCommandOptions) => {
      if (files.length === 0) {
        error(errors.usage.noFiles);
        process.exitCode = EXIT_CODES.USAGE_ERROR;
        return;
      }
      if (!isParameterFormat(options.format)) {
        error(errors.usage.invalidFormat(options.format));
        process.exitCode = EXIT_CODES.USAGE_ERROR;
        return;
      }

      try {
        const result = await mergeFiles(files, {
          outputFormat: options.format,
          includeComments: options.includeComments,
          strictRoot: options.strictRoot,
          provenance: options.provenance,
        });
        await emitMergeResult(result, options.output);
      } catch (err) {
        failCommand(errors.failures.mergeFailed, err);
      }
    });
}
