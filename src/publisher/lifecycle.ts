/**
 * Per-candidate lifecycle.
 *
 *   discovered → scored → ineligible
 *                       → eligible → name_derived → collision | published | failed
 */
export const CANDIDATE_STATES = [
  "discovered",
  "scored",
  "ineligible",
  "eligible",
  "name_derived",
  "collision",
  "published",
  "failed",
] as const;

export type CandidateState = (typeof CANDIDATE_STATES)[number];

export type CandidateEvent = "score" | "reject" | "accept" | "derive_name" | "collide" | "commit" | "fail";

const TRANSITIONS: Record<CandidateState, Partial<Record<CandidateEvent, CandidateState>>> = {
  discovered: { score: "scored" },
  scored: { reject: "ineligible", accept: "eligible" },
  eligible: { derive_name: "name_derived" },
  name_derived: { collide: "collision", commit: "published", fail: "failed" },
  ineligible: {},
  collision: {},
  published: {},
  failed: {},
};

export function isTerminal(state: CandidateState): boolean {
  return Object.keys(TRANSITIONS[state]).length === 0;
}

/** Pure transition function; throws on an event the state does not accept. */
export function nextCandidateState(current: CandidateState, event: CandidateEvent): CandidateState {
  const next = TRANSITIONS[current][event];
  if (!next) {
    throw new Error(`Invalid candidate transition: ${current} --${event}-->`);
  }
  return next;
}

/** Replay events from "discovered"; returns every state visited. */
export function traceCandidate(events: readonly CandidateEvent[]): CandidateState[] {
  const states: CandidateState[] = ["discovered"];
  let current: CandidateState = "discovered";
  for (const event of events) {
    current = nextCandidateState(current, event);
    states.push(current);
  }
  return states;
}
