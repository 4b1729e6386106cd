/**
 * Console rendering for pipeline progress and reports.
 */

import chalk from "chalk";
import { PipelineEvent, PipelineEventType } from "../core/events/event-bus";
import { DegradationRecord } from "../core/pipeline/stage-result";
import { ValidationReport } from "../core/orchestrator/pipeline-orchestrator";

export function formatEvent(event: PipelineEvent): string | null {
  switch (event.type) {
    case PipelineEventType.RUN_STARTED:
      return chalk.cyan(`Run ${event.runId}: ${event.stageOrder.join(" → ")}`);
    case PipelineEventType.RUN_COMPLETED:
      return chalk.cyan(`Run ${event.runId} completed`);
    case PipelineEventType.RUN_HALTED:
    case PipelineEventType.RUN_CANCELLED:
      return null;
    case PipelineEventType.STAGE_TRANSITION:
      switch (event.state) {
        case "invoking":
          return `${chalk.gray("…")} ${event.stageName} invoking`;
        case "cache_hit":
          return `${chalk.gray("…")} ${event.stageName} cache hit`;
        case "succeeded":
          return `${chalk.green("✓")} ${event.stageName} succeeded (${event.elapsedMs}ms)`;
        case "failed_recovered":
          return `${chalk.yellow("⚠")} ${event.stageName} degraded: ${event.failureKind} → ${event.appliedFallback}`;
        case "failed_halted":
          return `${chalk.red("✗")} ${event.stageName} failed: ${event.failureKind}`;
        case "pending":
          return null;
      }
  }
  return null;
}

export function formatDegradations(degraded: DegradationRecord[]): string[] {
  if (degraded.length === 0) return [];
  return [
    chalk.yellow(`${degraded.length} stage(s) degraded:`),
    ...degraded.map((d) => `  - ${d.stageName} (${d.kind}, ${d.appliedFallback}): ${d.reason}`),
  ];
}

export function formatValidation(report: ValidationReport): string[] {
  const lines: string[] = [];
  const mark = (ok: boolean) => (ok ? chalk.green("✓") : chalk.red("✗"));

  for (const error of report.errors) {
    lines.push(`${mark(false)} ${error}`);
  }
  for (const stage of report.stages) {
    const detail = stage.ok ? `provider ${stage.provider}` : stage.error;
    lines.push(`${mark(stage.ok)} stage ${stage.stageName}: ${detail}`);
  }
  for (const provider of report.providers) {
    lines.push(`${mark(provider.ok)} provider ${provider.providerId}: ${provider.detail}`);
  }
  lines.push(report.ok ? chalk.green("Configuration is valid") : chalk.red("Configuration is invalid"));
  return lines;
}
