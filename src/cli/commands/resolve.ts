import * as path from "node:path";
import type { Command } from "commander";
import { isParameterFormat } from "../../merge/codec.js";
import { errors } from "../../strings/index.js";
import { loadWorkspace, type Workspace } from "../../workspace/context.js";
import { mergeNodeParameters, resolveParameterSources } from "../../workspace/resolve.js";
import { EXIT_CODES } from "../exit-codes.js";
import {
  debug,
  error,
  failCommand,
  formatSourcesTable,
  info,
  output,
  warn,
} from "../output.js";
import { emitMergeResult } from "./merge.js";

type GlobalOptions = {
  manifest?: string;
};

interface ResolveCommandOptions {
  format: string;
  provenance?: boolean;
  output?: string;
}

async function openWorkspace(command: Command): Promise<Workspace> {
  const { manifest } = command.optsWithGlobals<GlobalOptions>();
  const workspace = await loadWorkspace({ manifestPath: manifest });
  debug(`Manifest: ${workspace.manifestPath}`);
  debug(`Data directory: ${workspace.dataDir}`);
  return workspace;
}

function reportNoParameters(workspace: Workspace, configuration: string, fqdn: string): void {
  error(
    errors.workspace.noParameters(configuration, fqdn),
    errors.suggestions.addParameters(path.join(workspace.dataDir, "parameters", configuration)),
  );
  process.exitCode = EXIT_CODES.NOT_FOUND;
}

/**
 * Register 'resolve' command: merge a node's parameters from the workspace
 */
export function registerResolveCommand(program: Command): void {
  program
    .command("resolve <configuration> <fqdn>")
    .description("Merge the parameters that apply to a node")
    .option("-f, --format <format>", "Output format (yaml or json)", "yaml")
    .option("--provenance", "Show which scope supplied each overriding value")
    .option("-o, --output <file>", "Write merged parameters to a file")
    .action(
      async (
        configuration: string,
        fqdn: string,
        options: ResolveCommandOptions,
        command: Command,
      ) => {
        if (!isParameterFormat(options.format)) {
          error(errors.usage.invalidFormat(options.format));
          process.exitCode = EXIT_CODES.USAGE_ERROR;
          return;
        }

        try {
          const workspace = await openWorkspace(command);
          const result = await mergeNodeParameters(workspace, configuration, fqdn, {
            outputFormat: options.format,
            provenance: options.provenance,
            onWarning: (warning) => warn(warning.message),
            onDebug: debug,
          });

          if (!result) {
            reportNoParameters(workspace, configuration, fqdn);
            return;
          }

          await emitMergeResult(result, options.output);
        } catch (err) {
          failCommand(errors.failures.resolveFailed, err);
        }
      },
    );
}

/**
 * Register 'sources' command: list the parameter files that apply to a node
 */
export function registerSourcesCommand(program: Command): void {
  program
    .command("sources <configuration> <fqdn>")
    .description("List the parameter files that apply to a node, lowest precedence first")
    .action(async (configuration: string, fqdn: string, _options: unknown, command: Command) => {
      try {
        const workspace = await openWorkspace(command);
        const sources = await resolveParameterSources(workspace, configuration, fqdn, {
          onDebug: debug,
        });

        output(
          sources.map((source) => ({
            scopeName: source.scopeName,
            scopeType: source.scopeType,
            scopeValue: source.scopeValue ?? null,
            precedence: source.precedence,
            path: source.path,
            checksum: source.checksum,
          })),
          () => {
            if (sources.length === 0) {
              info(errors.workspace.noParameters(configuration, fqdn));
              return;
            }
            console.log(formatSourcesTable(sources));
          },
        );
      } catch (err) {
        failCommand(errors.failures.resolveFailed, err);
      }
    });
}
