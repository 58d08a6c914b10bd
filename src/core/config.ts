import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { ConfigError, describeError } from "../types/errors";
import type { EnvironmentSpec } from "../types/release";

export const DEFAULT_CONFIG_FILE = "release.config.json";

const CommandSchema = z.array(z.string().min(1)).min(1);

export const EnvironmentSpecSchema = z.object({
  id: z.string().regex(/^[A-Za-z0-9_.-]+$/, "must be a plain identifier"),
  runtime: z.string().min(1),
  systemPackages: z.boolean().default(false),
  install: z.array(CommandSchema).default([]),
  test: z.array(CommandSchema).min(1),
  build: z.array(CommandSchema).min(1),
  outputDir: z.string().min(1).default("dist"),
  timeoutMs: z.number().int().positive().optional(),
});

// Python 3 builds every distribution form, Python 2 only adds its egg.
export const REFERENCE_ENVIRONMENTS: EnvironmentSpec[] = [
  {
    id: "primary",
    runtime: "/usr/bin/python3",
    systemPackages: true,
    install: [
      ["pip", "install", "-e", "."],
      ["pip", "install", "pypandoc"],
    ],
    test: [["python", "setup.py", "nosetests"]],
    build: [["python", "setup.py", "sdist", "bdist_egg", "bdist_wheel"]],
    outputDir: "dist",
  },
  {
    id: "legacy",
    runtime: "/usr/bin/python2",
    systemPackages: false,
    install: [
      ["pip", "install", "-e", "."],
      ["pip", "install", "pypandoc"],
    ],
    test: [["python", "setup.py", "test"]],
    build: [["python", "setup.py", "bdist_egg"]],
    outputDir: "dist",
  },
];

export const ReleaseConfigSchema = z.object({
  project: z.object({
    name: z.string().min(1),
    packageName: z.string().min(1),
  }),
  versionFile: z.object({
    path: z.string().min(1),
    pattern: z.string().min(1).refine(hasSingleCaptureGroup, {
      message: "must be a valid regular expression with one capture group",
    }),
    replacement: z.string().includes("{version}"),
  }),
  changelog: z
    .object({
      path: z.string().min(1).default("CHANGELOG.md"),
      entry: z.string().includes("{version}").default("{name} {version}"),
    })
    .default({}),
  identity: z
    .object({
      nameVariable: z.string().min(1).default("DEBFULLNAME"),
      emailVariable: z.string().min(1).default("DEBEMAIL"),
    })
    .default({}),
  requiredTools: z
    .array(z.object({ name: z.string().min(1), hint: z.string().optional() }))
    .default([
      { name: "pandoc", hint: 'e.g. with "sudo apt-get install pandoc"' },
      { name: "twine", hint: 'e.g. with "pip3 install --user twine"' },
    ]),
  stagingDir: z.string().includes("{version}").default("dist-{version}"),
  parallel: z.boolean().default(false),
  environments: z
    .array(EnvironmentSpecSchema)
    .min(1)
    .default(REFERENCE_ENVIRONMENTS)
    .refine((envs) => new Set(envs.map((e) => e.id)).size === envs.length, {
      message: "environment ids must be unique",
    }),
  nativePackage: z
    .object({
      metadataDir: z.string().min(1).default("debian"),
      revision: z.string().min(1).default("1"),
      architecture: z.string().min(1).default("all"),
      license: z.string().min(1).default("apache"),
    })
    .default({}),
  signing: z.object({ key: z.string().min(1).optional() }).default({}),
  tagMessage: z.string().default("Release {version}"),
  commandTimeoutMs: z.number().int().positive().optional(),
  releaseNotesUrl: z.string().url().optional(),
});

export type ReleaseConfig = z.infer<typeof ReleaseConfigSchema>;

export interface Identity {
  readonly nameVariable: string;
  readonly emailVariable: string;
  readonly fullName?: string;
  readonly email?: string;
}

/**
 * Everything a run needs, captured once at start-up. Stages never consult
 * process.env or process.cwd() themselves.
 */
export interface ReleaseSettings extends Omit<ReleaseConfig, "identity"> {
  readonly repoRoot: string;
  readonly identity: Identity;
  readonly searchPath: readonly string[];
  readonly baseEnv: Readonly<Record<string, string>>;
}

export interface LoadSettingsOptions {
  repoRoot: string;
  configFile?: string;
  env: NodeJS.ProcessEnv;
  overrides?: { parallel?: boolean };
}

function hasSingleCaptureGroup(source: string): boolean {
  try {
    // an alternation with the empty string matches anything, exposing the group count
    const match = new RegExp(`${source}|`).exec("");
    return match !== null && match.length === 2;
  } catch {
    return false;
  }
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    .join("; ");
}

export function parseConfig(raw: unknown, source = "configuration"): ReleaseConfig {
  const result = ReleaseConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid ${source}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function readConfigFile(file: string): ReleaseConfig {
  let text: string;
  try {
    text = fs.readFileSync(file, "utf8");
  } catch (err) {
    throw new ConfigError(`Cannot read ${file}: ${describeError(err)}`, {
      cause: err,
    });
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`${file} is not valid JSON: ${describeError(err)}`, {
      cause: err,
    });
  }
  return parseConfig(raw, path.basename(file));
}

export function createSettings(
  config: ReleaseConfig,
  opts: Omit<LoadSettingsOptions, "configFile">,
): ReleaseSettings {
  const baseEnv: Record<string, string> = {};
  for (const [key, value] of Object.entries(opts.env)) {
    if (value !== undefined) baseEnv[key] = value;
  }
  const { identity, ...rest } = config;
  const settings: ReleaseSettings = {
    ...rest,
    parallel: opts.overrides?.parallel ?? config.parallel,
    repoRoot: path.resolve(opts.repoRoot),
    identity: {
      ...identity,
      fullName: nonEmpty(baseEnv[identity.nameVariable]),
      email: nonEmpty(baseEnv[identity.emailVariable]),
    },
    searchPath: (baseEnv["PATH"] ?? "").split(path.delimiter).filter(Boolean),
    baseEnv,
  };
  return deepFreeze(settings);
}

export function loadSettings(opts: LoadSettingsOptions): ReleaseSettings {
  const file = path.resolve(
    opts.repoRoot,
    opts.configFile ?? DEFAULT_CONFIG_FILE,
  );
  return createSettings(readConfigFile(file), opts);
}

/** Replaces `{key}` placeholders; unknown keys are left untouched. */
export function fillTemplate(
  template: string,
  values: Record<string, string>,
): string {
  return template.replace(/\{(\w+)\}/g, (whole, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? (values[key] ?? whole) : whole,
  );
}

export function stagingDirFor(settings: ReleaseSettings, version: string): string {
  return path.join(settings.repoRoot, fillTemplate(settings.stagingDir, { version }));
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() ? value : undefined;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
