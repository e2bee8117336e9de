import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, mkdirSync, writeFileSync, rmSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { REPO_ROOT } from "@tribunal/config";
import type { RubricCriterion } from "@tribunal/config";
import type { OpinionGenerator, OpinionRequest } from "@tribunal/engine";
import { parseArgs, run } from "./cli.js";
import {
  conceptEvidence,
  createRepositoryCollector,
  extractFilePaths,
  parseGitLog,
  scanForShellExecution,
  scanSourceStructure,
  summarizeHistory,
} from "./collectors.js";

const quiet = { LOG_LEVEL: "error" };

class UnanimousGenerator implements OpinionGenerator {
  calls = 0;

  async generate(request: OpinionRequest): Promise<string> {
    this.calls += 1;
    return JSON.stringify({ score: 5, rationale: `${request.role} is satisfied`, citations: [] });
  }
}

describe("parseArgs", () => {
  it("extracts command from argv", () => {
    const result = parseArgs(["node", "tribunal", "audit", "--repo", "."]);
    assert.equal(result.command, "audit");
    assert.deepEqual(result.args, ["--repo", "."]);
  });

  it("defaults to help when no command given", () => {
    assert.equal(parseArgs(["node", "tribunal"]).command, "help");
  });

  it("normalizes rubric validate command", () => {
    const result = parseArgs(["node", "tribunal", "rubric", "validate", "--rubric", "r.json"]);
    assert.equal(result.command, "rubric:validate");
    assert.deepEqual(result.args, ["--rubric", "r.json"]);
  });
});

describe("rubric validate", () => {
  it("accepts the bundled rubric", async () => {
    assert.equal(await run(["node", "tribunal", "rubric", "validate"], REPO_ROOT, { env: quiet }), 0);
  });

  it("rejects a rubric with a duplicate criterion", async () => {
    const tmp = mkdtempSync(join(tmpdir(), "tribunal-rubric-"));
    try {
      const path = join(tmp, "rubric.json");
      const criterion = { id: "dup", name: "Dup", category: "process" };
      writeFileSync(
        path,
        JSON.stringify({
          version: "1",
          roleWeights: { process: { Prosecutor: 1, Defense: 1, TechLead: 1 } },
          criteria: [criterion, criterion],
        }),
      );
      assert.equal(await run(["node", "tribunal", "rubric", "validate", "--rubric", path], REPO_ROOT, { env: quiet }), 1);
    } finally {
      rmSync(tmp, { recursive: true });
    }
  });
});

describe("audit", () => {
  it("writes a report with fact overrides from the collected evidence", async () => {
    const tmp = mkdtempSync(join(tmpdir(), "tribunal-audit-"));
    try {
      const repo = join(tmp, "repo");
      mkdirSync(join(repo, "src"), { recursive: true });
      writeFileSync(join(repo, "README.md"), "# Demo\n");
      writeFileSync(join(repo, "src", "state.ts"), "export const state = {};\n");
      writeFileSync(join(repo, "src", "run.ts"), 'import { execSync } from "node:child_process";\nexecSync(`ls ${process.cwd()}`);\n');
      const doc = join(tmp, "report.md");
      writeFileSync(
        doc,
        [
          "The graph fans out in parallel branches.",
          "",
          "State synchronization is implemented through the reducer in src/state.ts, because parallel writes would race.",
          "",
          "See src/graph.ts for the fan-out wiring.",
        ].join("\n"),
      );
      const out = join(tmp, "out", "report.json");
      const generator = new UnanimousGenerator();

      const code = await run(
        ["node", "tribunal", "audit", "--repo", repo, "--doc", doc, "--out", out, "--run-id", "run-cli"],
        REPO_ROOT,
        { env: quiet, generator, now: () => new Date("2026-01-01T00:00:00.000Z") },
      );

      assert.equal(code, 0);
      assert.equal(generator.calls, 27);
      const report: unknown = JSON.parse(readFileSync(out, "utf-8"));
      assert.ok(typeof report === "object" && report !== null);
      assert.ok("verdicts" in report && Array.isArray(report.verdicts));
      assert.deepEqual(
        report.verdicts.map((v: { criterionId: string; finalScore: number | string }) => [v.criterionId, v.finalScore]),
        [
          ["chief_justice_synthesis", 5],
          ["git_forensic_analysis", 5],
          ["graph_orchestration", 5],
          ["judicial_nuance", 5],
          ["report_accuracy", 3],
          ["safe_tool_engineering", 3],
          ["state_management_rigor", 5],
          ["structured_output_enforcement", 5],
          ["theoretical_depth", 3],
        ],
      );
      assert.deepEqual(report.verdicts[5].factOverride, { ceiling: 3, evidenceLocations: ["src/run.ts:2"] });
      assert.ok("overallScore" in report && "errors" in report && "generatedAt" in report);
      assert.equal(report.overallScore, 4.3);
      assert.deepEqual(report.errors, []);
      assert.equal(report.generatedAt, "2026-01-01T00:00:00.000Z");
    } finally {
      rmSync(tmp, { recursive: true });
    }
  });

  it("requires --repo", async () => {
    assert.equal(await run(["node", "tribunal", "audit"], REPO_ROOT, { env: quiet }), 1);
  });

  it("fails without a generator key", async () => {
    const tmp = mkdtempSync(join(tmpdir(), "tribunal-audit-"));
    try {
      assert.equal(await run(["node", "tribunal", "audit", "--repo", tmp], REPO_ROOT, { env: quiet }), 1);
    } finally {
      rmSync(tmp, { recursive: true });
    }
  });
});

describe("document collector helpers", () => {
  it("extracts cited file paths", () => {
    assert.deepEqual(extractFilePaths("See `src/graph.ts`, README.md and Node.js."), ["README.md", "src/graph.ts"]);
  });

  it("separates explained concepts from dropped keywords", () => {
    const markers = ["because"];
    const explained = conceptEvidence("r.md", "We use a reducer because writes race.", "state_synchronization", ["reducer"], markers, []);
    const dropped = conceptEvidence("r.md", "Reducer.", "state_synchronization", ["reducer"], markers, []);
    const absent = conceptEvidence("r.md", "Nothing here.", "metacognition", ["metacognition"], markers, []);
    assert.equal(explained.confidence, 0.85);
    assert.equal(dropped.severity, "medium");
    assert.equal(absent.found, false);
  });
});

describe("repository collector helpers", () => {
  it("flags shell execution lines", () => {
    const hits = scanForShellExecution("tools/run.py", "import os\nos.system(cmd)\nsubprocess.run(args, shell=True)\n");
    assert.deepEqual(
      hits.map((hit) => [hit.line, hit.label]),
      [
        [2, "os.system() call"],
        [3, "subprocess call with shell=True"],
      ],
    );
  });

  it("summarizes commit history", () => {
    const commits = parseGitLog("a1\t100\tinit project setup\nb2\t5000\tadd git tool\nc3\t9000\twire graph nodes\n");
    const summary = summarizeHistory(commits, { setup: ["setup"], tooling: ["tool"], orchestration: ["graph"] });
    assert.equal(commits.length, 3);
    assert.deepEqual(summary.phasesFound, ["setup", "tooling", "orchestration"]);
    assert.equal(summary.progressionDetected, true);
    assert.equal(summary.bulkUpload, false);
  });

  it("finds typed state, reducers and fan-out in TypeScript sources", () => {
    const source = [
      "export interface AuditState {",
      "  errors: string[];",
      "}",
      "export function mergeState(a: AuditState, b: AuditState) {",
      "  return Promise.all([a, b]);",
      "}",
    ].join("\n");
    assert.deepEqual(
      scanSourceStructure("src/state.ts", source).map((hit) => [hit.facet, hit.line]),
      [
        ["fan_out", 5],
        ["typed_state", 1],
        ["state_reducer", 4],
      ],
    );
  });

  it("treats a repeated edge source as fan-out and spots conditional edges", () => {
    const source = [
      'builder.add_edge(START, "repo_investigator")',
      'builder.add_edge(START, "doc_analyst")',
      'builder.add_conditional_edges("aggregate", route)',
      "class AgentState(TypedDict):",
      "    opinions: Annotated[list, operator.add]",
    ].join("\n");
    assert.deepEqual(
      scanSourceStructure("src/graph.py", source).map((hit) => [hit.facet, hit.line]),
      [
        ["fan_out", 2],
        ["conditional_routing", 3],
        ["typed_state", 4],
        ["state_reducer", 5],
      ],
    );
  });

  it("emits one structure evidence per facet tagged with the matching criterion", async () => {
    const tmp = mkdtempSync(join(tmpdir(), "tribunal-structure-"));
    try {
      mkdirSync(join(tmp, "src"));
      writeFileSync(join(tmp, "src", "graph.ts"), "const a = 1;\nconst b = 2;\nawait Promise.all([a, b]);\n");
      const criteria: RubricCriterion[] = [
        { id: "graph_orchestration", name: "Graph Orchestration", category: "architecture", targetArtifact: "repo" },
      ];
      const evidence = await createRepositoryCollector(criteria)(tmp, new AbortController().signal);
      const structure = evidence.filter((item) => item.goal.startsWith("structure:"));

      assert.deepEqual(
        structure.map((item) => [item.goal, item.found]),
        [
          ["structure:fan_out", true],
          ["structure:conditional_routing", false],
          ["structure:typed_state", false],
          ["structure:state_reducer", false],
          ["structure:structured_output", false],
        ],
      );
      const fanOut = structure[0];
      assert.ok(fanOut);
      assert.equal(fanOut.location, "src/graph.ts:3");
      assert.deepEqual(fanOut.criterionIds, ["graph_orchestration"]);
      assert.equal(fanOut.content, "src/graph.ts:3 await Promise.all([a, b]);");
      assert.deepEqual(structure[4]?.criterionIds, []);
    } finally {
      rmSync(tmp, { recursive: true });
    }
  });
});
