import fs from "node:fs/promises";
import { DEFAULT_ABC_FLOW_PARAMS, type TAbcFlowParams } from "@shared/abc-flow";
import { parseAbcFlowParams, type ProgressCallback } from "../modules/abc/abc-flow-series";
import { AbcFlowParameterError, withIoContext } from "../modules/abc/errors";

export type AbcFlowCliArgs = {
  jsonPath?: string;
  rawJson?: string;
  overrides: Record<string, unknown>;
  quiet?: boolean;
  help?: boolean;
};

export const ABC_FLOW_USAGE =
  "Usage: tsx cli/abc-flow.ts [--json params.json] [--params '{...}'] [--out dir] [--basename name] " +
  "[--n N] [--steps n] [--t-start t] [--t-end t] [--formulation coupled|legacy] " +
  "[--encoding raw|ascii] [--quiet] [--help]";

const STRING_FLAGS: Record<string, keyof TAbcFlowParams> = {
  "--out": "outDir",
  "-o": "outDir",
  "--basename": "basename",
  "-b": "basename",
  "--formulation": "formulation",
  "--encoding": "encoding",
};

const NUMBER_FLAGS: Record<string, keyof TAbcFlowParams> = {
  "--n": "n",
  "-n": "n",
  "--steps": "nStep",
  "--t-start": "tStart",
  "--t-end": "tEnd",
};

export const parseAbcFlowArgs = (args: readonly string[]): AbcFlowCliArgs => {
  const parsed: AbcFlowCliArgs = { overrides: {} };

  for (let i = 0; i < args.length; i += 1) {
    const raw = args[i];
    const eq = raw.startsWith("--") ? raw.indexOf("=") : -1;
    const token = eq >= 0 ? raw.slice(0, eq) : raw;
    const takeValue = (): string => {
      if (eq >= 0) return raw.slice(eq + 1);
      const next = args[i + 1];
      if (next === undefined) {
        throw new AbcFlowParameterError(`missing value for ${token}`);
      }
      i += 1;
      return next;
    };

    if (token === "--help" || token === "-h") {
      parsed.help = true;
    } else if (token === "--quiet" || token === "-q") {
      parsed.quiet = true;
    } else if (token === "--json" || token === "-j") {
      parsed.jsonPath = takeValue();
    } else if (token === "--params" || token === "-p") {
      parsed.rawJson = takeValue();
    } else if (Object.hasOwn(STRING_FLAGS, token)) {
      parsed.overrides[STRING_FLAGS[token]] = takeValue();
    } else if (Object.hasOwn(NUMBER_FLAGS, token)) {
      parsed.overrides[NUMBER_FLAGS[token]] = Number(takeValue());
    } else {
      throw new AbcFlowParameterError(`unknown argument: ${raw}`);
    }
  }

  return parsed;
};

const parseJsonObject = (src: string, origin: string): Record<string, unknown> => {
  let value: unknown;
  try {
    value = JSON.parse(src);
  } catch (error) {
    throw new AbcFlowParameterError(`${origin} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new AbcFlowParameterError(`${origin} must be a JSON object`);
  }
  return Object.fromEntries(Object.entries(value));
};

export type ResolveConfigDeps = {
  env?: NodeJS.ProcessEnv;
  readFile?: (filePath: string) => Promise<string>;
};

/** Defaults, then the JSON file, then inline JSON, then explicit flags. */
export const resolveAbcFlowConfig = async (
  args: AbcFlowCliArgs,
  { env = process.env, readFile = (filePath) => fs.readFile(filePath, "utf8") }: ResolveConfigDeps = {},
): Promise<TAbcFlowParams> => {
  const merged: Record<string, unknown> = { ...DEFAULT_ABC_FLOW_PARAMS };
  const envOutDir = env.ABC_FLOW_OUT_DIR?.trim();
  if (envOutDir) {
    merged.outDir = envOutDir;
  }
  if (args.jsonPath) {
    const jsonPath = args.jsonPath;
    const src = await withIoContext("reading", jsonPath, () => readFile(jsonPath));
    Object.assign(merged, parseJsonObject(src, jsonPath));
  }
  if (args.rawJson) {
    Object.assign(merged, parseJsonObject(args.rawJson, "--params"));
  }
  Object.assign(merged, args.overrides);
  return parseAbcFlowParams(merged);
};

/** Reports whole percentages, only when the value changes. */
export const createPercentReporter = (write: (line: string) => void): ProgressCallback => {
  let last = -1;
  return (completed, total) => {
    const pct = Math.floor((completed / total) * 100);
    if (pct === last) return;
    last = pct;
    write(`${pct}% (${completed}/${total})`);
  };
};
