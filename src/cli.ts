#!/usr/bin/env node
/**
 * CLI entrypoint for dropbox-doc-loader.
 *
 * Usage:
 *   dropbox-doc-loader --folder "/Course Files"
 *   dropbox-doc-loader --file /notes/meeting.txt --file /notes/plan.md
 */
import { USAGE, parseCliArgs, type CliOptions } from "./cli-args.js";
import { DropboxLoader, errorMessage, getDetails, type LogEntry } from "./index.js";

const command = parseCliArgs(process.argv.slice(2), process.env);

if (command.kind === "help") {
  console.log(USAGE);
  process.exit(0);
}
if (command.kind === "invalid") {
  console.error(`${command.reason}\n\n${USAGE}`);
  process.exit(1);
}

async function run(options: CliOptions): Promise<number> {
  const loader = DropboxLoader.fromConfig(options.config);

  if (options.listFolders) {
    const folders = await loader.listFolders(options.request);
    for (const folder of folders) console.log(folder.path);
    return 0;
  }

  const result = await loader.load(options.request);
  const details = getDetails(result, options.level);

  const show = (entry: LogEntry): void => {
    console.error(`[${entry.severity}] ${entry.message}`);
  };
  details.progress.forEach(show);

  for (const record of result.records) {
    console.log(JSON.stringify(record));
  }

  if (result.invalidFiles.length > 0) {
    console.error(`\nSkipped ${result.invalidFiles.length} unsupported file(s):`);
    for (const path of result.invalidFiles) console.error(`  ${path}`);
  }

  if (details.errors.length > 0) {
    console.error(`\n${details.errors.length} error(s):`);
    for (const error of details.errors) console.error(`  ${error.message}`);
    return 1;
  }
  return 0;
}

try {
  process.exitCode = await run(command.options);
} catch (err) {
  console.error(errorMessage(err));
  process.exitCode = 1;
}
