import type {
  CandidateDecision,
  Decision,
  MatchCandidate,
  OperatorCommand,
} from "../types.js";
import * as logger from "../utils/logger.js";
import type { DecisionSource } from "./decision_source.js";

export type { DecisionSource, PromptRequest } from "./decision_source.js";
export {
  ScriptedDecisionSource,
  TerminalDecisionSource,
  formatCandidatePrompt,
} from "./decision_source.js";

const COMMANDS = new Map<string, OperatorCommand>([
  ["y", "remove"],
  ["yes", "remove"],
  ["r", "remove"],
  ["n", "keep"],
  ["no", "keep"],
  ["k", "keep"],
  ["a", "remove-all"],
  ["all", "remove-all"],
  ["s", "keep-all"],
  ["skip", "keep-all"],
  ["q", "quit"],
  ["quit", "quit"],
]);

/** Map an operator answer to a command; null means "ask again". */
export function parseCommand(input: string): OperatorCommand | null {
  return COMMANDS.get(input.trim().toLowerCase()) ?? null;
}

/**
 * Prompt loop states. `cursor` is the index of the next undecided candidate.
 * `override` applies a "-remaining" choice without asking; `quitting` keeps
 * everything left.
 */
export type RemoverState =
  | { kind: "prompting"; cursor: number }
  | { kind: "override"; cursor: number; decision: Decision }
  | { kind: "quitting"; cursor: number }
  | { kind: "finished" };

export interface Transition {
  state: RemoverState;
  decision: Decision;
  decidedBy: CandidateDecision["decidedBy"];
}

/**
 * Apply an operator command to the candidate at the cursor.
 */
export function transition(
  state: Extract<RemoverState, { kind: "prompting" }>,
  command: OperatorCommand
): Transition {
  const cursor = state.cursor + 1;
  switch (command) {
    case "remove":
      return { state: { kind: "prompting", cursor }, decision: "remove", decidedBy: "operator" };
    case "keep":
      return { state: { kind: "prompting", cursor }, decision: "keep", decidedBy: "operator" };
    case "remove-all":
      return {
        state: { kind: "override", cursor, decision: "remove" },
        decision: "remove",
        decidedBy: "operator",
      };
    case "keep-all":
      return {
        state: { kind: "override", cursor, decision: "keep" },
        decision: "keep",
        decidedBy: "operator",
      };
    case "quit":
      return { state: { kind: "quitting", cursor }, decision: "keep", decidedBy: "quit" };
  }
}

export interface ResolveOptions {
  autoRemove?: boolean; // Start as if "remove all remaining" was chosen
  path?: string; // Shown in prompts
}

export interface ResolveResult {
  removals: Set<number>; // Block indices to drop
  decisions: CandidateDecision[];
  quit: boolean;
  endOfInput: boolean;
  reprompts: number;
}

/**
 * Ask the operator about each candidate in turn and collect the blocks to
 * remove. Running out of input counts as quitting: everything still
 * undecided is kept.
 */
export async function resolve(
  candidates: MatchCandidate[],
  source: DecisionSource,
  options: ResolveOptions = {}
): Promise<ResolveResult> {
  const decisions: CandidateDecision[] = [];
  let state: RemoverState = options.autoRemove
    ? { kind: "override", cursor: 0, decision: "remove" }
    : { kind: "prompting", cursor: 0 };
  let quit = false;
  let endOfInput = false;
  let reprompts = 0;
  let retry = false;

  while (state.kind !== "finished") {
    if (state.cursor >= candidates.length) {
      state = { kind: "finished" };
      continue;
    }
    const candidate = candidates[state.cursor];

    switch (state.kind) {
      case "override":
        decisions.push({ candidate, decision: state.decision, decidedBy: "override" });
        state = { ...state, cursor: state.cursor + 1 };
        break;

      case "quitting":
        decisions.push({ candidate, decision: "keep", decidedBy: "quit" });
        state = { kind: "quitting", cursor: state.cursor + 1 };
        break;

      case "prompting": {
        const answer = await source.ask({
          candidate,
          total: candidates.length,
          path: options.path,
          retry,
        });
        let command: OperatorCommand | null;
        if (answer === null) {
          logger.debug("No more operator input, keeping remaining cues");
          endOfInput = true;
          command = "quit";
        } else {
          command = parseCommand(answer);
        }

        if (command === null) {
          reprompts++;
          retry = true;
          break;
        }
        retry = false;
        if (command === "quit") quit = true;

        const next: Transition = transition(state, command);
        decisions.push({ candidate, decision: next.decision, decidedBy: next.decidedBy });
        state = next.state;
        break;
      }
    }
  }

  const removals = new Set(
    decisions
      .filter((d) => d.decision === "remove")
      .map((d) => d.candidate.block.index)
  );
  return { removals, decisions, quit, endOfInput, reprompts };
}
