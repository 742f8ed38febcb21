/**
 * Configuration validation and backend factory.
 */
import { z } from "zod";
import { ConfigError } from "./core/exceptions.js";
import type { SessionFactory } from "./storage/backend.js";
import { DiskSessionFactory } from "./storage/disk.js";
import { DropboxSessionFactory } from "./storage/dropbox.js";

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

const StorageConfigSchema = z.object({
  provider: z.enum(["dropbox", "disk"]).default("dropbox"),
  config: z.record(z.unknown()).default({}),
});

const DiskConfigSchema = z.object({
  basePath: z.string().min(1).optional(),
  base_path: z.string().min(1).optional(),
  pageSize: z.number().int().positive().default(100),
});

export const ConfigSchema = z.object({
  storage: StorageConfigSchema.default({}),
  tempDir: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

export interface LoaderSettings {
  tempDir?: string;
  timeoutMs?: number;
}

function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  raw: unknown,
  what: string,
): z.infer<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid ${what}: ${detail}`, { cause: result.error });
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Session factories
// ---------------------------------------------------------------------------

function buildSessions(
  provider: Config["storage"]["provider"],
  config: Record<string, unknown>,
): SessionFactory {
  switch (provider) {
    case "dropbox":
      return new DropboxSessionFactory();
    case "disk": {
      const disk = parseOrThrow(DiskConfigSchema, config, "disk storage config");
      return new DiskSessionFactory(
        disk.basePath ?? disk.base_path ?? "./data",
        disk.pageSize,
      );
    }
  }
}

// ---------------------------------------------------------------------------
// Top-level config → backends
// ---------------------------------------------------------------------------

export function parseConfig(raw: unknown): {
  sessions: SessionFactory;
  settings: LoaderSettings;
} {
  const config = parseOrThrow(ConfigSchema, raw, "config");
  const sessions = buildSessions(config.storage.provider, config.storage.config);
  const settings: LoaderSettings = {};
  if (config.tempDir !== undefined) settings.tempDir = config.tempDir;
  if (config.timeoutMs !== undefined) settings.timeoutMs = config.timeoutMs;
  return { sessions, settings };
}
