import { randomUUID } from "node:crypto";
import { join, resolve } from "node:path";
import type { AuditConfig } from "@tribunal/config";
import { loadConfig, loadRubric } from "@tribunal/config";
import type { OpinionGenerator } from "@tribunal/engine";
import { AuditEngine, ChatOpinionGenerator, FetchChatClient, PromptRegistry, errorMessage, setLogLevel } from "@tribunal/engine";
import { createDocumentCollector, createRepositoryCollector } from "./collectors.js";
import { renderReport, writeReport } from "./report.js";

function emit(level: "info" | "error", event: string, message: string, context?: Record<string, unknown>): void {
  const payload = {
    timestamp: new Date().toISOString(),
    level,
    event,
    message,
    ...(context ? { context } : {}),
  };
  process.stdout.write(`${JSON.stringify(payload)}\n`);
}

/** Parse CLI arguments into a command and flags. */
export function parseArgs(argv: string[]): { command: string; args: string[] } {
  const args = argv.slice(2);

  if (args[0] === "rubric" && args[1] === "validate") {
    return { command: "rubric:validate", args: args.slice(2) };
  }

  return { command: args[0] ?? "help", args: args.slice(1) };
}

export function getFlagValue(args: string[], name: string): string | undefined {
  const index = args.findIndex((a) => a === name);
  if (index === -1) return undefined;
  return args[index + 1];
}

/** Seams the tests replace; production wiring is built from configuration. */
export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  generator?: OpinionGenerator;
  now?: () => Date;
}

async function createGenerator(config: AuditConfig, repoRoot: string): Promise<OpinionGenerator> {
  if (!config.generatorApiKey) {
    throw new Error("OPENAI_API_KEY is not set; the reviewer roles need a generator endpoint");
  }
  const registry = await PromptRegistry.loadFromRepo(repoRoot);
  return new ChatOpinionGenerator(new FetchChatClient(config.generatorApiKey, config.generatorBaseUrl), registry);
}

export async function executeAudit(repoRoot: string, args: string[], deps: CliDependencies = {}): Promise<number> {
  const repo = getFlagValue(args, "--repo");
  if (!repo) {
    emit("error", "cli.audit.usage", "--repo <dir> is required.");
    return 1;
  }

  const config = loadConfig({}, deps.env ?? process.env);
  setLogLevel(config.logLevel);
  const rubric = await loadRubric(resolve(getFlagValue(args, "--rubric") ?? config.rubricPath));
  const generator = deps.generator ?? (await createGenerator(config, repoRoot));
  const doc = getFlagValue(args, "--doc");
  const runId = getFlagValue(args, "--run-id") ?? randomUUID();
  const reportPath = resolve(getFlagValue(args, "--out") ?? join(config.outputDir, `${runId}.json`));

  const engine = new AuditEngine({
    settings: config,
    rubric,
    collectors: {
      repo: createRepositoryCollector(rubric.criteria),
      doc: createDocumentCollector(rubric.criteria),
    },
    generator,
  });

  const result = await engine.run({
    runId,
    target: { repoRef: resolve(repo), ...(doc ? { docRef: resolve(doc) } : {}) },
  });
  const report = renderReport(result, deps.now?.() ?? new Date());
  await writeReport(reportPath, report);

  const produced = result.status === "completed" && result.verdicts.length > 0;
  emit(produced ? "info" : "error", "cli.audit.complete", produced ? "Audit completed." : "Audit produced no verdict set.", {
    runId,
    status: result.status,
    overallScore: report.overallScore,
    errors: report.errors.length,
    reportPath,
  });
  return produced ? 0 : 1;
}

/** Main CLI entry point. Returns exit code. */
export async function run(argv: string[], repoRoot: string, deps: CliDependencies = {}): Promise<number> {
  const { command, args } = parseArgs(argv);

  switch (command) {
    case "audit": {
      try {
        return await executeAudit(repoRoot, args, deps);
      } catch (err) {
        emit("error", "cli.audit.error", errorMessage(err));
        return 1;
      }
    }

    case "rubric:validate": {
      const config = loadConfig({}, deps.env ?? process.env);
      const rubricPath = resolve(getFlagValue(args, "--rubric") ?? config.rubricPath);
      try {
        const rubric = await loadRubric(rubricPath);
        emit("info", "cli.rubric.valid", "Rubric is valid.", {
          rubricPath,
          version: rubric.version,
          criteria: rubric.criteria.length,
        });
        return 0;
      } catch (err) {
        emit("error", "cli.rubric.invalid", errorMessage(err), { rubricPath });
        return 1;
      }
    }

    case "help":
    default:
      emit("info", "cli.help", "CLI usage output.", {
        usage: [
          "tribunal audit --repo <dir> [--doc <file>] [--rubric <file>] [--out <file>] [--run-id <id>]",
          "tribunal rubric validate [--rubric <file>]   Validate a rubric document",
          "tribunal help                                Show this help message",
        ],
      });
      return 0;
  }
}
