import { describe, expect, it, vi } from "vitest";
import { AbcFlowParams, DEFAULT_ABC_FLOW_PARAMS, MAX_ABS_TIME } from "../shared/abc-flow";
import { AbcFlowIoError, AbcFlowParameterError } from "../modules/abc/errors";
import {
  ABC_FLOW_USAGE,
  createPercentReporter,
  parseAbcFlowArgs,
  resolveAbcFlowConfig,
} from "../tools/abc-flow-config";

describe("parseAbcFlowArgs", () => {
  it("maps flags onto parameter overrides", () => {
    const args = parseAbcFlowArgs([
      "--out",
      "runs",
      "--n=8",
      "--steps",
      "3",
      "--t-end=2.5",
      "--formulation",
      "legacy",
      "--encoding=ascii",
      "-q",
    ]);
    expect(args).toEqual({
      overrides: { outDir: "runs", n: 8, nStep: 3, tEnd: 2.5, formulation: "legacy", encoding: "ascii" },
      quiet: true,
    });
  });

  it("collects JSON sources and help", () => {
    expect(parseAbcFlowArgs(["--json", "params.json", "--params={\"n\":6}", "-h"])).toEqual({
      overrides: {},
      jsonPath: "params.json",
      rawJson: "{\"n\":6}",
      help: true,
    });
  });

  it("rejects unknown flags and missing values", () => {
    expect(() => parseAbcFlowArgs(["--bogus"])).toThrow(/unknown argument: --bogus/);
    expect(() => parseAbcFlowArgs(["--out"])).toThrow(AbcFlowParameterError);
  });

  it("does not treat inherited object keys as flags", () => {
    expect(() => parseAbcFlowArgs(["constructor", "x"])).toThrow(/unknown argument: constructor/);
    expect(() => parseAbcFlowArgs(["toString", "1"])).toThrow(/unknown argument: toString/);
  });
});

describe("ABC_FLOW_USAGE", () => {
  it("lists the help flag", () => {
    expect(ABC_FLOW_USAGE.endsWith("[--quiet] [--help]")).toBe(true);
  });
});

describe("resolveAbcFlowConfig", () => {
  it("layers defaults, env, file, inline JSON and flags", async () => {
    const readFile = vi.fn(async () => JSON.stringify({ n: 6, basename: "run", linearRates: [] }));
    const params = await resolveAbcFlowConfig(
      { jsonPath: "params.json", rawJson: "{\"n\": 7}", overrides: { nStep: 4 } },
      { env: { ABC_FLOW_OUT_DIR: "/data/abc" }, readFile },
    );

    expect(readFile).toHaveBeenCalledWith("params.json");
    expect(params).toEqual({
      ...DEFAULT_ABC_FLOW_PARAMS,
      n: 7,
      basename: "run",
      linearRates: [],
      nStep: 4,
      outDir: "/data/abc",
    });
  });

  it("falls back to the default record", async () => {
    const params = await resolveAbcFlowConfig({ overrides: {} }, { env: {} });
    expect(params).toEqual(DEFAULT_ABC_FLOW_PARAMS);
    expect(params.betas[1]).toBe(Math.PI / 4);
  });

  it("rejects malformed JSON and non-object payloads", async () => {
    await expect(resolveAbcFlowConfig({ rawJson: "{n:", overrides: {} }, { env: {} })).rejects.toThrow(
      /--params is not valid JSON/,
    );
    await expect(resolveAbcFlowConfig({ rawJson: "[1, 2]", overrides: {} }, { env: {} })).rejects.toThrow(
      "--params must be a JSON object",
    );
  });

  it("reports non-numeric flag values against the parameter", async () => {
    const error = await resolveAbcFlowConfig({ overrides: { n: Number("abc") } }, { env: {} }).catch(
      (err: unknown) => err,
    );
    expect(error).toBeInstanceOf(AbcFlowParameterError);
    expect(error instanceof AbcFlowParameterError && error.issues[0].startsWith("n: ")).toBe(true);
  });

  it("wraps unreadable parameter files as IO failures", async () => {
    const readFile = vi.fn(async () => {
      throw new Error("ENOENT");
    });
    await expect(
      resolveAbcFlowConfig({ jsonPath: "missing.json", overrides: {} }, { env: {}, readFile }),
    ).rejects.toBeInstanceOf(AbcFlowIoError);
  });
});

describe("AbcFlowParams", () => {
  it("rejects base names with path separators", () => {
    const result = AbcFlowParams.safeParse({ ...DEFAULT_ABC_FLOW_PARAMS, basename: "runs/abc" });
    expect(result.success).toBe(false);
  });

  it("keeps base names and output directories verbatim", () => {
    const parsed = AbcFlowParams.parse({ ...DEFAULT_ABC_FLOW_PARAMS, basename: " abc ", outDir: "out " });
    expect(parsed.basename).toBe(" abc ");
    expect(parsed.outDir).toBe("out ");
  });

  it("rejects blank base names and output directories", () => {
    expect(AbcFlowParams.safeParse({ ...DEFAULT_ABC_FLOW_PARAMS, basename: "  " }).success).toBe(false);
    expect(AbcFlowParams.safeParse({ ...DEFAULT_ABC_FLOW_PARAMS, outDir: "" }).success).toBe(false);
  });

  it("bounds times below the fixed-point formatting limit", () => {
    const accepts = (tStart: number, tEnd: number) =>
      AbcFlowParams.safeParse({ ...DEFAULT_ABC_FLOW_PARAMS, tStart, tEnd }).success;
    expect(accepts(0, 1e20)).toBe(true);
    expect(accepts(0, MAX_ABS_TIME)).toBe(false);
    expect(accepts(-MAX_ABS_TIME, 0)).toBe(false);
  });

  it("defaults formulation and encoding", () => {
    const { formulation, encoding, ...rest } = DEFAULT_ABC_FLOW_PARAMS;
    const parsed = AbcFlowParams.parse(rest);
    expect(parsed.formulation).toBe("coupled");
    expect(parsed.encoding).toBe("raw");
    expect(formulation).toBe("coupled");
    expect(encoding).toBe("raw");
  });
});

describe("createPercentReporter", () => {
  it("prints whole percentages when they change", () => {
    const lines: string[] = [];
    const report = createPercentReporter((line) => lines.push(line));
    for (let done = 1; done <= 4; done += 1) report(done, 400);
    report(1, 3);
    report(2, 3);
    report(3, 3);

    expect(lines).toEqual(["0% (1/400)", "1% (4/400)", "33% (1/3)", "66% (2/3)", "100% (3/3)"]);
  });
});
