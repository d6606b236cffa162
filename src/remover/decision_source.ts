import { createInterface, type Interface } from "readline";
import chalk from "chalk";
import { describePattern } from "../patterns/index.js";
import type { MatchCandidate } from "../types.js";
import { formatSrtTiming } from "../utils/time_utils.js";

export interface PromptRequest {
  candidate: MatchCandidate;
  total: number;
  path?: string;
  retry: boolean; // The previous answer was not understood
}

/**
 * Supplies operator answers. `null` means no more input is coming.
 */
export interface DecisionSource {
  ask(request: PromptRequest): Promise<string | null>;
  close?(): void;
}

export const PROMPT_CHOICES =
  "Remove this cue? [y]es / [n]o / [a]ll remaining / [s]kip remaining / [q]uit: ";

/**
 * Text shown for a candidate: where it is (by the number the file gives the
 * cue), the cue itself, and the pattern that flagged it.
 */
export function formatCandidatePrompt(request: PromptRequest): string {
  const { candidate, total, path } = request;
  const { block, pattern } = candidate;
  const location = path
    ? `${path}, cue ${block.sourceIndex}`
    : `Cue ${block.sourceIndex}`;

  const lines = [
    "",
    chalk.bold(`${location} (match ${candidate.ordinal} of ${total})`),
    chalk.gray(formatSrtTiming(block.startMs, block.endMs)),
    block.text,
    chalk.gray("----------------------------------------"),
    `Matched ${chalk.cyan(describePattern(pattern))}`,
  ];
  if (request.retry) {
    lines.push(chalk.yellow("Answer not recognized."));
  }
  return lines.join("\n") + "\n" + PROMPT_CHOICES;
}

/**
 * Reads answers line by line from a stream (stdin by default). When the
 * stream ends every later question gets null.
 */
export class TerminalDecisionSource implements DecisionSource {
  // Opened on the first question so runs that never ask leave stdin alone
  private reader: { rl: Interface; lines: AsyncIterator<string> } | null = null;
  private ended = false;

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  async ask(request: PromptRequest): Promise<string | null> {
    if (this.ended) return null;
    if (!this.reader) {
      const rl = createInterface({ input: this.input, terminal: false });
      this.reader = { rl, lines: rl[Symbol.asyncIterator]() };
    }
    this.output.write(formatCandidatePrompt(request));
    const next = await this.reader.lines.next();
    if (next.done) {
      this.ended = true;
      this.output.write("\n");
      return null;
    }
    return next.value;
  }

  close(): void {
    this.reader?.rl.close();
    this.reader = null;
  }
}

/**
 * Replays a fixed list of answers, then reports end of input.
 */
export class ScriptedDecisionSource implements DecisionSource {
  readonly requests: PromptRequest[] = [];
  private readonly answers: string[];

  constructor(answers: string[]) {
    this.answers = [...answers];
  }

  async ask(request: PromptRequest): Promise<string | null> {
    this.requests.push(request);
    return this.answers.shift() ?? null;
  }
}
