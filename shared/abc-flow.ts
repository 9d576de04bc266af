import { z } from "zod";

/**
 * ABC flow series parameters.
 *
 * The sinusoidal phase terms arrive as three parallel arrays (amplitudes,
 * angular frequencies, offsets) and must have equal length.
 */

export const AbcFlowFormulation = z.enum(["coupled", "legacy"]);
export type TAbcFlowFormulation = z.infer<typeof AbcFlowFormulation>;

export const VtkDataEncoding = z.enum(["raw", "ascii"]);
export type TVtkDataEncoding = z.infer<typeof VtkDataEncoding>;

const finite = z.number().finite();

/** Beyond this magnitude `toFixed` switches to exponent notation. */
export const MAX_ABS_TIME = 1e21;

const time = finite.gt(-MAX_ABS_TIME).lt(MAX_ABS_TIME);

const nonBlank = z.string().refine((value) => value.trim().length > 0, "must not be blank");

export const AbcFlowParams = z
  .object({
    n: z.number().int().min(2),
    A: finite,
    B: finite,
    C: finite,
    epsilons: z.array(finite),
    omegas: z.array(finite),
    betas: z.array(finite),
    linearRates: z.array(finite),
    tStart: time,
    tEnd: time,
    nStep: z.number().int().min(1),
    outDir: nonBlank,
    basename: nonBlank.refine((value) => !/[\\/]/.test(value), "must not contain path separators"),
    formulation: AbcFlowFormulation.default("coupled"),
    encoding: VtkDataEncoding.default("raw"),
  })
  .superRefine((params, ctx) => {
    const { epsilons, omegas, betas } = params;
    if (epsilons.length !== omegas.length || epsilons.length !== betas.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["epsilons"],
        message: `sinusoidal term arrays differ in length (epsilons=${epsilons.length}, omegas=${omegas.length}, betas=${betas.length})`,
      });
    }
    if (params.tEnd < params.tStart) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["tEnd"],
        message: `tEnd (${params.tEnd}) must not precede tStart (${params.tStart})`,
      });
    }
  });

export type TAbcFlowParams = z.infer<typeof AbcFlowParams>;
export type TAbcFlowParamsInput = z.input<typeof AbcFlowParams>;

export const DEFAULT_ABC_FLOW_PARAMS: Readonly<TAbcFlowParams> = Object.freeze({
  n: 48,
  A: 1,
  B: 1,
  C: 1,
  epsilons: [0.5, 0.2],
  omegas: [2, 1],
  betas: [0, Math.PI / 4],
  linearRates: [1, 0.3],
  tStart: 0,
  tEnd: 10,
  nStep: 200,
  outDir: "output",
  basename: "abc",
  formulation: "coupled",
  encoding: "raw",
});
