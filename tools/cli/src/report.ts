import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { AuditRunResult, CriterionVerdict, RunStatus } from "@tribunal/engine";
import { sortOpinions } from "@tribunal/engine";

export interface AuditReport {
  runId: string;
  generatedAt: string;
  status: RunStatus;
  overallScore: number | null;
  verdicts: CriterionVerdict[];
  errors: string[];
}

/** The run's externally visible artifact: verdicts in criterion order, errors in arrival order. */
export function renderReport(result: AuditRunResult, generatedAt: Date = new Date()): AuditReport {
  return {
    runId: result.runId,
    generatedAt: generatedAt.toISOString(),
    status: result.status,
    overallScore: result.state.finalResult?.overallScore ?? null,
    verdicts: result.verdicts.map((verdict) => ({ ...verdict, opinions: sortOpinions(verdict.opinions) })),
    errors: [...result.errors],
  };
}

export async function writeReport(reportPath: string, report: AuditReport): Promise<void> {
  await mkdir(dirname(reportPath), { recursive: true });
  await writeFile(reportPath, `${JSON.stringify(report, null, 2)}\n`, "utf-8");
}
