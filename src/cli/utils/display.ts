/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type { CycleReport } from "../../services/sync/pipeline.js";
import type {
  EventGeometry,
  FeedEvent,
  ParseWarning,
  Severity,
} from "../../types/index.js";

const SEVERITY_COLORS: Record<Severity, (text: string) => string> = {
  green: chalk.green,
  orange: chalk.yellow,
  red: chalk.red,
};

export function formatSeverity(severity: Severity | null): string {
  return severity === null ? chalk.gray("-") : SEVERITY_COLORS[severity](severity);
}

/**
 * Short human-readable geometry: the point, or the polygon's vertex count
 */
export function describeGeometry(geometry: EventGeometry | null): string {
  if (geometry === null) {
    return chalk.gray("none");
  }
  if (geometry.type === "Point") {
    const [lon, lat] = geometry.coordinates;
    return `POINT ${lat.toFixed(3)}, ${lon.toFixed(3)}`;
  }
  const vertices = geometry.coordinates[0]?.length ?? 0;
  return `POLYGON (${String(vertices)} vertices)`;
}

/**
 * Display parsed events in a formatted table
 */
export function displayEventsTable(events: FeedEvent[], limit?: number): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Source ID"),
      chalk.cyan("Type"),
      chalk.cyan("Severity"),
      chalk.cyan("Occurred"),
      chalk.cyan("Geometry"),
    ],
    colWidths: [16, 13, 10, 22, 32],
  });

  const shown = limit !== undefined ? events.slice(0, limit) : events;
  for (const event of shown) {
    table.push([
      chalk.green(event.sourceId),
      event.eventType ?? chalk.gray("-"),
      formatSeverity(event.severity),
      event.occurredAt?.toISOString().slice(0, 16).replace("T", " ") ??
        chalk.gray("-"),
      describeGeometry(event.geometry),
    ]);
  }

  console.log(table.toString());

  if (limit !== undefined && events.length > limit) {
    const remaining = events.length - limit;
    console.log(chalk.gray(`  ... and ${String(remaining)} more events`));
  }
}

/**
 * Display skipped records
 */
export function displayWarnings(warnings: ParseWarning[]): void {
  if (warnings.length === 0) {
    return;
  }

  console.log(chalk.bold.yellow(`\nSkipped records (${String(warnings.length)}):`));
  for (const warning of warnings) {
    const identifier =
      warning.identifier !== undefined ? ` ${warning.identifier}` : "";
    console.log(
      `  ${chalk.gray(`[${warning.source} #${String(warning.index)}]`)}${identifier}: ${warning.reason}`
    );
  }
}

/**
 * Display the outcome of one sync cycle
 */
export function displayCycleReport(report: CycleReport): void {
  const seconds =
    (report.finishedAt.getTime() - report.startedAt.getTime()) / 1000;

  console.log(chalk.bold("\nCycle report:"));
  console.log(
    `  Parsed:     ${String(report.parsed.geojson)} GeoJSON, ${String(report.parsed.xml)} XML`
  );
  console.log(`  Canonical:  ${String(report.canonicalCount)}`);
  console.log(`  Inserted:   ${chalk.green(String(report.insertedCount))}`);
  console.log(`  Updated:    ${chalk.cyan(String(report.updatedCount))}`);
  console.log(`  Unchanged:  ${String(report.unchangedCount)}`);
  console.log(
    `  Failed:     ${report.failed.length > 0 ? chalk.red(String(report.failed.length)) : "0"}`
  );
  console.log(`  Duration:   ${seconds.toFixed(1)}s`);

  for (const record of report.dropped) {
    console.log(chalk.yellow(`  dropped ${record.sourceId}: ${record.reason}`));
  }
  for (const record of report.failed) {
    console.log(chalk.red(`  failed ${record.sourceId}: ${record.reason}`));
  }

  displayWarnings(report.warnings);
}
