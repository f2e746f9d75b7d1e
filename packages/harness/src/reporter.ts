import pc from "picocolors";
import type { HarnessSummary, TestResult } from "./types.js";

export function formatGroupHeader(name: string): string {
  return pc.bold(name);
}

export function formatResult(result: TestResult): string {
  const title = `${pc.blue(result.group)} > ${result.name}`;
  if (result.status === "passed") {
    return `${pc.green("PASS")} ${title} ${pc.dim(`(${result.durationMs}ms)`)}`;
  }
  return `${pc.red("FAIL")} ${title} ${pc.red(`[${result.failureKind}] ${result.message}`)}`;
}

export function formatSummary(summary: HarnessSummary): string {
  const failed = `${summary.failed} failed`;
  return [
    `${pc.bold("Tests:")} ${pc.green(`${summary.passed} passed`)}`,
    summary.failed > 0 ? pc.red(failed) : failed,
    `${summary.results.length} total`,
  ].join(", ");
}
