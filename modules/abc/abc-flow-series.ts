import {
  AbcFlowParams,
  type TAbcFlowParams,
  type TAbcFlowParamsInput,
} from "../../shared/abc-flow";
import type { LogFn } from "../core/log";
import { AbcFlowParameterError } from "./errors";
import { ABC_FIELD_GENERATORS } from "./field";
import { buildCoordinateMesh, buildCubeGrid } from "./grid";
import { createPhaseFunction, legacyPhase, zipPhaseTerms, type PhaseFunction } from "./phase";
import { writeSeriesIndex } from "./pvd-writer";
import { ensureOutputDir, writeTimestep } from "./vtr-writer";

export type AbcFlowRunState =
  | "configuring"
  | "grid-built"
  | "running"
  | "index-written"
  | "done"
  | "failed";

export type ProgressCallback = (completed: number, total: number) => void;

export interface AbcFlowRunOptions {
  onProgress?: ProgressCallback;
  /** Checked before every step; an aborted run rejects with the signal's reason. */
  signal?: AbortSignal;
  log?: LogFn;
}

export interface AbcFlowStepRecord {
  step: number;
  time: number;
  phase: number;
  fileName: string;
  filePath: string;
}

export interface AbcFlowSeriesResult {
  outDir: string;
  indexPath: string;
  steps: AbcFlowStepRecord[];
}

export const parseAbcFlowParams = (input: unknown): TAbcFlowParams => {
  const parsed = AbcFlowParams.safeParse(input);
  if (!parsed.success) {
    throw AbcFlowParameterError.fromZod(parsed.error);
  }
  return parsed.data;
};

export const stepSize = ({ tStart, tEnd, nStep }: Pick<TAbcFlowParams, "tStart" | "tEnd" | "nStep">) =>
  (tEnd - tStart) / nStep;

export const phaseFunctionFor = (params: TAbcFlowParams): PhaseFunction =>
  params.formulation === "legacy"
    ? legacyPhase
    : createPhaseFunction({
        terms: zipPhaseTerms(params.epsilons, params.omegas, params.betas),
        linearRates: params.linearRates,
      });

export const summarizeSeries = (result: AbcFlowSeriesResult) =>
  `Generated ${result.steps.length} time steps in '${result.outDir}'`;

/**
 * One export run. Steps execute strictly in order; step k+1 starts only after
 * the file for step k is on disk and progress for k has been reported. Any
 * failure moves the run to `failed` and propagates; files already written stay.
 */
export class AbcFlowSeriesRun {
  private current: AbcFlowRunState = "configuring";
  private activeStep = -1;

  constructor(
    private readonly input: TAbcFlowParamsInput,
    private readonly options: AbcFlowRunOptions = {},
  ) {}

  get state(): AbcFlowRunState {
    return this.current;
  }

  /** Index of the step in progress (or last attempted), -1 before the loop. */
  get step(): number {
    return this.activeStep;
  }

  async run(): Promise<AbcFlowSeriesResult> {
    if (this.current !== "configuring") {
      throw new Error(`ABC flow run already started (state=${this.current})`);
    }
    try {
      return await this.execute();
    } catch (error) {
      this.current = "failed";
      throw error;
    }
  }

  private async execute(): Promise<AbcFlowSeriesResult> {
    const { onProgress, signal, log } = this.options;
    const params = parseAbcFlowParams(this.input);
    const { outDir, basename, nStep, tStart, encoding } = params;

    const grid = buildCubeGrid(params.n);
    const mesh = buildCoordinateMesh(grid);
    const phase = phaseFunctionFor(params);
    const generate = ABC_FIELD_GENERATORS[params.formulation];
    const dt = stepSize(params);
    this.current = "grid-built";
    log?.(
      `grid ${params.n}^3 (${params.formulation}, ${encoding}); writing ${nStep} steps of dt=${dt} to ${outDir}`,
    );

    await ensureOutputDir(outDir);

    const steps: AbcFlowStepRecord[] = [];
    this.current = "running";
    for (let k = 0; k < nStep; k += 1) {
      signal?.throwIfAborted();
      this.activeStep = k;
      const time = tStart + k * dt;
      const ph = phase(time);
      const field = generate(mesh, params, ph);
      const written = await writeTimestep({ outDir, basename, step: k, grid, field, encoding });
      steps.push({ step: k, time, phase: ph, fileName: written.fileName, filePath: written.filePath });
      onProgress?.(k + 1, nStep);
    }

    const indexPath = await writeSeriesIndex(
      outDir,
      basename,
      steps.map(({ fileName, time }) => ({ fileName, time })),
    );
    this.current = "index-written";
    log?.(`series index written to ${indexPath}`);

    this.current = "done";
    return { outDir, indexPath, steps };
  }
}

export const generateAbcFlowSeries = (
  input: TAbcFlowParamsInput,
  options: AbcFlowRunOptions = {},
): Promise<AbcFlowSeriesResult> => new AbcFlowSeriesRun(input, options).run();
