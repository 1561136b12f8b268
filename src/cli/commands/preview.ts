import { Argument } from "commander";
import ora from "ora";

import { loadConfig } from "../../config.js";
import { parseGeojsonFeed } from "../../parsers/geojson.js";
import { parseXmlFeed } from "../../parsers/xml.js";
import { errorMessage } from "../../services/sync/errors.js";
import { createSourceClient } from "../../services/sync/index.js";
import { displayEventsTable, displayWarnings } from "../utils/display.js";

import type { FeedSource } from "../../types/index.js";
import type { Command } from "commander";

// ============================================================================
// Preview Command
// ============================================================================

export function registerPreviewCommand(program: Command): void {
  program
    .command("preview")
    .description("Fetch and parse one feed without writing anything")
    .addArgument(
      new Argument("<feed>", "Feed to preview").choices(["geojson", "xml"])
    )
    .option("-l, --limit <n>", "Maximum events to display", "25")
    .action(async (feed: string, options: { limit: string }) => {
      const source: FeedSource = feed === "xml" ? "xml" : "geojson";
      const limit = Number.parseInt(options.limit, 10);
      const spinner = ora(`Fetching ${source} feed...`).start();

      try {
        const client = createSourceClient(loadConfig());
        const raw =
          source === "xml" ? await client.fetchXml() : await client.fetchGeojson();

        spinner.text = `Parsing ${source} feed...`;
        const fetchedAt = new Date();
        const result =
          source === "xml"
            ? parseXmlFeed(raw, fetchedAt)
            : parseGeojsonFeed(raw, fetchedAt);

        spinner.succeed(
          `Parsed ${String(result.events.length)} events from the ${source} feed (${String(result.warnings.length)} skipped)`
        );
        displayEventsTable(
          result.events,
          Number.isNaN(limit) ? undefined : limit
        );
        displayWarnings(result.warnings);
      } catch (error) {
        spinner.fail(`Preview failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}
