import { execFile } from "node:child_process";
import { readFileSync } from "node:fs";
import { readFile, readdir, stat } from "node:fs/promises";
import { dirname, join, relative, resolve, sep } from "node:path";
import { fileURLToPath } from "node:url";
import { promisify } from "node:util";
import type { RubricCriterion } from "@tribunal/config";
import type { Evidence, EvidenceCollector } from "@tribunal/engine";
import { CROSS_REFERENCE_GOAL, CollectionError, MANIFEST_GOAL, emitStructuredLog, errorMessage } from "@tribunal/engine";

const execFileAsync = promisify(execFile);

/* ------------------------------------------------------------------ */
/*  Keyword tables                                                     */
/* ------------------------------------------------------------------ */

export interface ForensicVocabulary {
  concepts: Record<string, string[]>;
  explanationMarkers: string[];
  historyPhases: Record<string, string[]>;
}

function isStringList(input: unknown): input is string[] {
  return Array.isArray(input) && input.every((item) => typeof item === "string");
}

function isStringListRecord(input: unknown): input is Record<string, string[]> {
  return typeof input === "object" && input !== null && Object.values(input).every(isStringList);
}

function isForensicVocabulary(input: unknown): input is ForensicVocabulary {
  return (
    typeof input === "object" &&
    input !== null &&
    "concepts" in input &&
    "explanationMarkers" in input &&
    "historyPhases" in input &&
    isStringListRecord(input.concepts) &&
    isStringList(input.explanationMarkers) &&
    isStringListRecord(input.historyPhases)
  );
}

const VOCABULARY_PATH = resolve(dirname(fileURLToPath(import.meta.url)), "..", "data", "forensic-concepts.json");

let vocabulary: ForensicVocabulary | undefined;

export function loadVocabulary(): ForensicVocabulary {
  if (!vocabulary) {
    const parsed: unknown = JSON.parse(readFileSync(VOCABULARY_PATH, "utf-8"));
    if (!isForensicVocabulary(parsed)) {
      throw new Error(`Invalid forensic vocabulary: ${VOCABULARY_PATH}`);
    }
    vocabulary = parsed;
  }
  return vocabulary;
}

/* ------------------------------------------------------------------ */
/*  Repository collector                                               */
/* ------------------------------------------------------------------ */

const SKIPPED_DIRECTORIES = new Set([".git", "node_modules", "dist", "build", "coverage", ".venv", "__pycache__"]);
const SOURCE_EXTENSIONS = /\.(ts|tsx|js|mjs|cjs|py)$/;
const MAX_SCANNED_BYTES = 512 * 1024;

/** Calls that hand a string to a shell. */
const SHELL_EXECUTION_PATTERNS: Array<{ pattern: RegExp; label: string }> = [
  { pattern: /\bos\.system\s*\(/, label: "os.system() call" },
  { pattern: /\bexecSync\s*\(/, label: "execSync() call" },
  { pattern: /\bshell\s*=\s*True\b/, label: "subprocess call with shell=True" },
  { pattern: /\bshell\s*:\s*true\b/, label: "child process spawned with shell: true" },
];

interface RequiredArtifact {
  goal: string;
  pattern: RegExp;
  description: string;
}

const REQUIRED_ARTIFACTS: RequiredArtifact[] = [
  { goal: "required_file:readme", pattern: /^README(\.md)?$/i, description: "README at the repository root" },
  { goal: "required_file:state_definition", pattern: /(^|\/)state\.(ts|js|py)$/, description: "state definition module" },
  { goal: "required_file:graph_definition", pattern: /(^|\/)graph\.(ts|js|py)$/, description: "graph definition module" },
  { goal: "required_file:tests", pattern: /(^|\/)(tests?\/|[^/]+\.test\.(ts|js)$|test_[^/]+\.py$)/, description: "automated tests" },
];

/** Relative POSIX paths of every file under `root`, sorted. */
export async function listRepositoryFiles(root: string): Promise<string[]> {
  const files: string[] = [];
  const walk = async (dir: string): Promise<void> => {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.isDirectory()) {
        if (!SKIPPED_DIRECTORIES.has(entry.name)) await walk(join(dir, entry.name));
      } else if (entry.isFile()) {
        files.push(relative(root, join(dir, entry.name)).split(sep).join("/"));
      }
    }
  };
  await walk(root);
  return files.sort();
}

export interface GitCommit {
  hash: string;
  timestamp: number;
  message: string;
}

export interface GitHistorySummary {
  commits: GitCommit[];
  phasesFound: string[];
  progressionDetected: boolean;
  bulkUpload: boolean;
}

export function summarizeHistory(commits: GitCommit[], phases: Record<string, string[]>): GitHistorySummary {
  const phasesFound = Object.entries(phases)
    .filter(([, keywords]) => commits.some((commit) => keywords.some((kw) => commit.message.toLowerCase().includes(kw))))
    .map(([phase]) => phase);
  const times = commits.map((commit) => commit.timestamp);
  const spanSeconds = times.length > 0 ? Math.max(...times) - Math.min(...times) : 0;
  return {
    commits,
    phasesFound,
    progressionDetected: phasesFound.length >= 2,
    bulkUpload: commits.length > 3 && spanSeconds < 300,
  };
}

export function parseGitLog(stdout: string): GitCommit[] {
  return stdout
    .split("\n")
    .map((line) => line.split("\t"))
    .flatMap(([hash, timestamp, ...message]) =>
      hash && timestamp ? [{ hash, timestamp: Number(timestamp), message: message.join("\t").trim() }] : [],
    );
}

async function readGitLog(root: string, signal?: AbortSignal): Promise<GitCommit[] | undefined> {
  try {
    const { stdout } = await execFileAsync("git", ["log", "--reverse", "--format=%H%x09%ct%x09%s"], {
      cwd: root,
      timeout: 30_000,
      maxBuffer: 16 * 1024 * 1024,
      signal,
    });
    return parseGitLog(stdout);
  } catch (err) {
    emitStructuredLog("cli", "debug", "git history unavailable", { root, error: errorMessage(err) });
    return undefined;
  }
}

function historyEvidence(root: string, summary: GitHistorySummary | undefined): Evidence {
  if (!summary || summary.commits.length === 0) {
    return {
      goal: "git_history",
      found: false,
      location: root,
      confidence: 0.9,
      rationale: summary ? "No commits found; the repository may be empty." : "No readable git history.",
    };
  }
  const total = summary.commits.length;
  let rationale: string;
  if (total === 1) {
    rationale = `Single commit: "${summary.commits[0]?.message ?? ""}". No development progression visible.`;
  } else if (summary.bulkUpload) {
    rationale = `${total} commits, all within 5 minutes: bulk upload rather than iterative development.`;
  } else if (summary.progressionDetected) {
    rationale = `${total} commits progressing through ${summary.phasesFound.join(", ")} phases.`;
  } else {
    rationale = `${total} commits without a clear phase progression in their messages.`;
  }
  return {
    goal: "git_history",
    found: true,
    location: `${root}/.git`,
    confidence: 0.9,
    rationale,
    content: summary.commits
      .slice(0, 20)
      .map((commit) => `${commit.hash.slice(0, 7)} ${commit.message}`)
      .join("\n"),
  };
}

export interface ShellExecutionHit {
  file: string;
  line: number;
  label: string;
  text: string;
}

export function scanForShellExecution(file: string, source: string): ShellExecutionHit[] {
  return source.split("\n").flatMap((text, index) =>
    SHELL_EXECUTION_PATTERNS.filter(({ pattern }) => pattern.test(text)).map(({ label }) => ({
      file,
      line: index + 1,
      label,
      text: text.trim(),
    })),
  );
}

/** Source constructs that show how a project orchestrates its graph, state and outputs. */
interface StructureFacet {
  facet: string;
  description: string;
  criterionId: string;
  patterns: RegExp[];
}

const STRUCTURE_FACETS: StructureFacet[] = [
  {
    facet: "fan_out",
    description: "concurrent fan-out",
    criterionId: "graph_orchestration",
    patterns: [/\bPromise\.(all|allSettled)\s*\(/, /\basyncio\.gather\s*\(/, /\bSend\s*\(/],
  },
  {
    facet: "conditional_routing",
    description: "conditional routing",
    criterionId: "graph_orchestration",
    patterns: [/\.(add_conditional_edges|addConditionalEdges)\s*\(/],
  },
  {
    facet: "typed_state",
    description: "typed state model",
    criterionId: "state_management_rigor",
    patterns: [/^\s*class\s+\w+\s*\((?:[\w.]+\.)?(BaseModel|TypedDict)\b/, /^\s*(export\s+)?(interface\s+\w*State\b|type\s+\w*State\s*=)/],
  },
  {
    facet: "state_reducer",
    description: "state reducer",
    criterionId: "state_management_rigor",
    patterns: [/\bAnnotated\[.*\boperator\.(add|ior)\b/, /\bfunction\s+(merge|reduce)\w*\s*\(/],
  },
  {
    facet: "structured_output",
    description: "schema-bound model output",
    criterionId: "structured_output_enforcement",
    patterns: [/\b(with_structured_output|withStructuredOutput)\s*\(/, /\bresponse_format\b/, /\bz\.object\s*\(/],
  },
];

export interface StructureHit {
  facet: string;
  file: string;
  line: number;
  text: string;
}

/** Graph edge sources (`add_edge("a", ...)` or `addEdge("a", ...)`) used more than once are a fan-out. */
const EDGE_SOURCE_PATTERN = /\.(?:add_edge|addEdge)\s*\(\s*["']?([\w-]+)["']?\s*,/g;

/** First line per facet in one source file that shows the construct. */
export function scanSourceStructure(file: string, source: string): StructureHit[] {
  const lines = source.split("\n");
  const hits: StructureHit[] = [];
  for (const { facet, patterns } of STRUCTURE_FACETS) {
    const index = lines.findIndex((text) => patterns.some((pattern) => pattern.test(text)));
    const line = lines[index];
    if (line !== undefined) hits.push({ facet, file, line: index + 1, text: line.trim() });
  }

  if (!hits.some((hit) => hit.facet === "fan_out")) {
    const sources = new Set<string>();
    for (const [index, text] of lines.entries()) {
      for (const match of text.matchAll(EDGE_SOURCE_PATTERN)) {
        const from = match[1] ?? "";
        if (sources.has(from)) {
          hits.unshift({ facet: "fan_out", file, line: index + 1, text: text.trim() });
          return hits;
        }
        sources.add(from);
      }
    }
  }
  return hits;
}

function structureEvidence(root: string, hits: StructureHit[], criteria: readonly RubricCriterion[]): Evidence[] {
  const known = new Set(criteria.map((criterion) => criterion.id));
  return STRUCTURE_FACETS.map(({ facet, description, criterionId }): Evidence => {
    const found = hits.filter((hit) => hit.facet === facet);
    const first = found[0];
    const base = {
      goal: `structure:${facet}`,
      confidence: 0.8,
      criterionIds: known.has(criterionId) ? [criterionId] : [],
    };
    if (!first) {
      return { ...base, found: false, location: root, rationale: `No ${description} found in the source files.` };
    }
    return {
      ...base,
      found: true,
      location: `${first.file}:${first.line}`,
      severity: "low",
      rationale: `Found ${description} in ${found.length} file(s).`,
      content: found
        .slice(0, 10)
        .map((hit) => `${hit.file}:${hit.line} ${hit.text}`)
        .join("\n"),
    };
  });
}

/**
 * Filesystem collector for a local checkout: file manifest, required
 * artifacts, git history, source structure and shell-execution calls.
 * Shell calls are high-severity findings tagged for every `security`
 * criterion.
 */
export function createRepositoryCollector(criteria: readonly RubricCriterion[]): EvidenceCollector {
  const securityCriteria = criteria.filter((criterion) => criterion.category === "security").map((c) => c.id);

  return async (repoRef, signal) => {
    const root = resolve(repoRef);
    const info = await stat(root).catch((err: unknown) => {
      throw new CollectionError(`cannot read repository ${root}: ${errorMessage(err)}`);
    });
    if (!info.isDirectory()) {
      throw new CollectionError(`repository path is not a directory: ${root}`);
    }

    const files = await listRepositoryFiles(root);
    const evidence: Evidence[] = [
      {
        goal: MANIFEST_GOAL,
        found: files.length > 0,
        location: root,
        confidence: 1,
        rationale: `${files.length} file(s) in the working tree.`,
        content: files.join("\n"),
      },
    ];

    for (const artifact of REQUIRED_ARTIFACTS) {
      const match = files.find((file) => artifact.pattern.test(file));
      evidence.push({
        goal: artifact.goal,
        found: match !== undefined,
        location: match ?? root,
        confidence: 0.95,
        rationale: match ? `Found ${artifact.description} at ${match}.` : `No ${artifact.description} found.`,
      });
    }

    const commits = await readGitLog(root, signal);
    evidence.push(historyEvidence(root, commits && summarizeHistory(commits, loadVocabulary().historyPhases)));

    const structure: StructureHit[] = [];
    for (const file of files.filter((name) => SOURCE_EXTENSIONS.test(name))) {
      signal.throwIfAborted();
      const path = join(root, file);
      if ((await stat(path)).size > MAX_SCANNED_BYTES) continue;
      const source = await readFile(path, "utf-8");
      structure.push(...scanSourceStructure(file, source));
      for (const hit of scanForShellExecution(file, source)) {
        evidence.push({
          goal: "shell_execution",
          found: true,
          location: `${hit.file}:${hit.line}`,
          confidence: 0.9,
          severity: "high",
          rationale: `${hit.label}: a string reaches a shell, which is an injection vector.`,
          content: hit.text,
          criterionIds: securityCriteria,
        });
      }
    }

    evidence.push(...structureEvidence(root, structure, criteria));
    return evidence;
  };
}

/* ------------------------------------------------------------------ */
/*  Document collector                                                 */
/* ------------------------------------------------------------------ */

const FILE_PATH_PATTERN = /(?:^|[\s`"'(])((?:\.\/)?(?:[\w.-]+\/)*[\w-]+\.(?:ts|tsx|js|py|json|md|toml|ya?ml|txt))(?=$|[\s`"'),:;]|\.(?:\s|$))/gm;

const BARE_FILE_NAME = /\.(md|json|toml|txt|ya?ml)$/;

/** File paths a document mentions, deduplicated and sorted. */
export function extractFilePaths(text: string): string[] {
  const found = new Set<string>();
  for (const match of text.matchAll(FILE_PATH_PATTERN)) {
    const path = match[1];
    // Bare names only count for document-like files; "Node.js" is not a path.
    if (path && path.length > 2 && (path.includes("/") || BARE_FILE_NAME.test(path))) found.add(path);
  }
  return [...found].sort();
}

export function conceptEvidence(
  docPath: string,
  text: string,
  concept: string,
  keywords: string[],
  markers: string[],
  criterionIds: string[],
): Evidence {
  const paragraphs = text
    .split(/\n\s*\n/)
    .map((paragraph) => paragraph.replace(/\s+/g, " ").trim())
    .filter((paragraph) => paragraph.length > 0);
  const mentioning = paragraphs.filter((paragraph) => keywords.some((kw) => paragraph.toLowerCase().includes(kw)));
  const explained = mentioning.find((paragraph) => markers.some((marker) => paragraph.toLowerCase().includes(marker)));
  const base = { goal: `concept:${concept}`, location: docPath, criterionIds };

  if (mentioning.length === 0) {
    return { ...base, found: false, confidence: 0.9, rationale: `The document never mentions ${concept}.` };
  }
  if (!explained) {
    return {
      ...base,
      found: true,
      confidence: 0.5,
      severity: "medium",
      rationale: `${concept} is named in ${mentioning.length} paragraph(s) but never explained (keyword dropping).`,
      content: (mentioning[0] ?? "").slice(0, 300),
    };
  }
  return {
    ...base,
    found: true,
    confidence: 0.85,
    rationale: `${concept} is explained in ${mentioning.length} paragraph(s).`,
    content: explained.slice(0, 300),
  };
}

/**
 * Plain-text or Markdown report collector: one Evidence per forensic
 * concept plus the list of file paths the report cites.
 */
export function createDocumentCollector(criteria: readonly RubricCriterion[]): EvidenceCollector {
  const docCriteria = criteria.filter((criterion) => criterion.targetArtifact === "doc").map((c) => c.id);

  return async (docRef) => {
    const docPath = resolve(docRef);
    const text = await readFile(docPath, "utf-8").catch((err: unknown) => {
      throw new CollectionError(`cannot read document ${docPath}: ${errorMessage(err)}`);
    });
    const { concepts, explanationMarkers } = loadVocabulary();

    const evidence = Object.entries(concepts).map(([concept, keywords]) =>
      conceptEvidence(docPath, text, concept, keywords, explanationMarkers, docCriteria),
    );

    const paths = extractFilePaths(text);
    evidence.push({
      goal: CROSS_REFERENCE_GOAL,
      found: paths.length > 0,
      location: docPath,
      confidence: 0.8,
      rationale: `${paths.length} file path(s) cited in the document.`,
      content: paths.join(", "),
    });
    return evidence;
  };
}
