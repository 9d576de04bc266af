import { AbcFlowParameterError } from "./errors";

export interface PhaseTerm {
  epsilon: number;
  omega: number;
  beta: number;
}

export interface PhaseDefinition {
  terms: readonly PhaseTerm[];
  linearRates: readonly number[];
}

export type PhaseFunction = (t: number) => number;

export const zipPhaseTerms = (
  epsilons: readonly number[],
  omegas: readonly number[],
  betas: readonly number[],
): PhaseTerm[] => {
  if (epsilons.length !== omegas.length || epsilons.length !== betas.length) {
    throw new AbcFlowParameterError(
      `sinusoidal term arrays differ in length (epsilons=${epsilons.length}, omegas=${omegas.length}, betas=${betas.length})`,
    );
  }
  return epsilons.map((epsilon, i) => ({ epsilon, omega: omegas[i], beta: betas[i] }));
};

/** phi(t) = sum eps_i sin(omega_i t + beta_i) + sum a_j t */
export const evaluatePhase = (definition: PhaseDefinition, t: number): number => {
  let sinusoidal = 0;
  for (const { epsilon, omega, beta } of definition.terms) {
    sinusoidal += epsilon * Math.sin(omega * t + beta);
  }
  let linear = 0;
  for (const rate of definition.linearRates) {
    linear += rate * t;
  }
  return sinusoidal + linear;
};

export const createPhaseFunction = (definition: PhaseDefinition): PhaseFunction => {
  const frozen: PhaseDefinition = {
    terms: definition.terms.map((term) => ({ ...term })),
    linearRates: [...definition.linearRates],
  };
  return (t) => evaluatePhase(frozen, t);
};

/** Phase of the legacy formulation: grows with time at unit rate. */
export const legacyPhase: PhaseFunction = (t) => t;
