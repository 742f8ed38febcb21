/**
 * Command-line parsing for dropbox-doc-loader.
 */
import { parseArgs } from "node:util";
import { errorMessage } from "./core/exceptions.js";
import { Severity, type LoadRequest } from "./core/types.js";

export const USAGE = `
dropbox-doc-loader: extract text records from Dropbox files

Usage:
  dropbox-doc-loader --folder <path>
  dropbox-doc-loader --file <path> [--file <path> ...]
  dropbox-doc-loader --list-folders

Options:
  --folder <path>          Folder to load recursively ("" is the root)
  --file <path>            File to load; repeat for several
  --team                   Use the team (root namespace) session
  --token <token>          Access token      (default: $DROPBOX_ACCESS_TOKEN)
  --refresh-token <token>  Refresh token     (needs --app-key and --app-secret)
  --app-key <key>          App key
  --app-secret <secret>    App secret
  --local <dir>            Read from a local directory instead of Dropbox
  --timeout <ms>           Deadline for each storage call
  --level <level>          Progress shown: debug | info | warning (default: info)
  --list-folders           Print top-level folders and exit
  --help                   Show this help
`.trim();

const LEVELS: Partial<Record<string, Severity>> = {
  debug: Severity.Debug,
  info: Severity.Info,
  warning: Severity.Warning,
};

export interface CliOptions {
  /** Raw loader config, validated by `DropboxLoader.fromConfig`. */
  config: {
    storage: { provider: "dropbox" } | { provider: "disk"; config: { basePath: string } };
    timeoutMs?: number;
  };
  request: LoadRequest;
  level: Severity;
  listFolders: boolean;
}

export type CliCommand =
  | { kind: "help" }
  | { kind: "invalid"; reason: string }
  | { kind: "run"; options: CliOptions };

function readArgs(args: string[]) {
  return parseArgs({
    args,
    options: {
      folder: { type: "string" },
      file: { type: "string", multiple: true },
      team: { type: "boolean", default: false },
      token: { type: "string" },
      "refresh-token": { type: "string" },
      "app-key": { type: "string" },
      "app-secret": { type: "string" },
      local: { type: "string" },
      timeout: { type: "string" },
      level: { type: "string", default: "info" },
      "list-folders": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
  }).values;
}

export function parseCliArgs(
  args: string[],
  env: Partial<Record<string, string>> = {},
): CliCommand {
  let values: ReturnType<typeof readArgs>;
  try {
    values = readArgs(args);
  } catch (err) {
    // unknown flags and missing option values
    return { kind: "invalid", reason: errorMessage(err) };
  }

  if (values.help) return { kind: "help" };

  const level = LEVELS[values.level];
  if (level === undefined) {
    return { kind: "invalid", reason: `unknown level: ${values.level}` };
  }

  const token = values.token ?? env.DROPBOX_ACCESS_TOKEN;
  if (!token) {
    return { kind: "invalid", reason: "no access token (--token or $DROPBOX_ACCESS_TOKEN)" };
  }

  const listFolders = values["list-folders"];
  if (!listFolders && values.folder === undefined && values.file === undefined) {
    return { kind: "invalid", reason: "give --folder, --file or --list-folders" };
  }

  let timeoutMs: number | undefined;
  if (values.timeout !== undefined) {
    timeoutMs = Number(values.timeout);
    if (!/^\d+$/.test(values.timeout) || timeoutMs <= 0) {
      return {
        kind: "invalid",
        reason: `--timeout must be a positive number of milliseconds, got "${values.timeout}"`,
      };
    }
  }

  const request: LoadRequest = {
    auth: {
      access_token: token,
      ...(values["refresh-token"] ? { refresh_token: values["refresh-token"] } : {}),
    },
    appKey: values["app-key"],
    appSecret: values["app-secret"],
    teamFolder: values.team,
  };
  if (values.folder !== undefined) request.folderPath = values.folder;
  if (values.file !== undefined) {
    if (values.file.length === 1) request.filePath = values.file[0];
    else request.filePaths = values.file;
  }

  return {
    kind: "run",
    options: {
      config: {
        storage: values.local
          ? { provider: "disk", config: { basePath: values.local } }
          : { provider: "dropbox" },
        ...(timeoutMs !== undefined ? { timeoutMs } : {}),
      },
      request,
      level,
      listFolders,
    },
  };
}
