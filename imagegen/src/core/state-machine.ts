/**
 * Generation steps in order. Each step moves the run into the state of the same
 * index in ALL_STATES.
 */
export const ALL_STEPS = ["load", "compose", "substitute", "fetch_artifacts", "render"] as const;

export type GenerationStep = (typeof ALL_STEPS)[number];

export const ALL_STATES = ["init", "loaded", "composed", "substituted", "artifacts_fetched", "rendered", "done"] as const;

export type GenerationState = (typeof ALL_STATES)[number];

export type GenerationStatus = GenerationState | `failed_${GenerationStep}`;

export type TransitionEvent = "success" | "failure";

/** The step that runs from a given state, or null once rendering is over. */
export function stepFrom(state: GenerationState): GenerationStep | null {
  const idx = ALL_STATES.indexOf(state);
  return idx < ALL_STEPS.length ? ALL_STEPS[idx] : null;
}

/**
 * Pure function: given current state + event, return next status.
 * `rendered` moves to `done` on success; there are no retries.
 */
export function nextState(current: GenerationState, event: TransitionEvent): GenerationStatus {
  if (current === "done") return "done";

  const step = stepFrom(current);
  if (event === "failure") {
    return `failed_${step ?? "render"}`;
  }

  return ALL_STATES[ALL_STATES.indexOf(current) + 1];
}
