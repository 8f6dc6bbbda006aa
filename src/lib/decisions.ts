/**
 * Decision points of a scan run
 *
 * The reconciliation and acquisition code never prompts by itself; it asks a
 * DecisionProvider. PromptDecisionProvider asks a human on a terminal,
 * PolicyDecisionProvider answers from a fixed batch policy.
 */

import { createInterface, Interface } from "readline/promises";
import { Readable, Writable } from "stream";
import {
  BatchPolicy,
  ReconciliationSummary,
  RetryEntry,
  RunMode,
} from "../types/pipeline";

export type ReuseChoice = "use" | "use_all" | "redownload";
export type ReinferChoice = "run" | "skip" | "skip_all";

export interface ConflictItem {
  identifier: string;
  reference: string;
  assetPath: string | null;
  loggedLabels: string[];
}

export interface DecisionProvider {
  /** Every identifier is logged and cached: re-run inference for all? */
  confirmReinferAll(summary: ReconciliationSummary): Promise<boolean>;
  /** Ledger and cache disagree: pick one policy for the whole batch */
  chooseBatchPolicy(summary: ReconciliationSummary): Promise<BatchPolicy>;
  /** Asset exists but was never logged */
  confirmReuse(item: ConflictItem): Promise<ReuseChoice>;
  /** Asset exists and was already logged */
  confirmReinfer(item: ConflictItem, mode: RunMode): Promise<ReinferChoice>;
  /** Logged, but the asset is gone */
  confirmRedownload(item: ConflictItem): Promise<boolean>;
  confirmRetry(entries: RetryEntry[]): Promise<boolean>;
  close?(): void;
}

export interface PromptStreams {
  input: Readable;
  output: Writable;
}

export class PromptDecisionProvider implements DecisionProvider {
  private rl: Interface | null = null;

  constructor(
    private streams: PromptStreams = {
      input: process.stdin,
      output: process.stdout,
    },
  ) {}

  async confirmReinferAll(): Promise<boolean> {
    const answer = await this.ask(
      "All extracted items are already processed and still on disk.\n" +
        "Do you want to re-run inference for all of them? (Y/N): ",
    );
    return answer === "y";
  }

  async chooseBatchPolicy(
    summary: ReconciliationSummary,
  ): Promise<BatchPolicy> {
    const answer = await this.ask(
      "The ledger and the files on disk disagree " +
        `(${summary.loggedButMissing} logged but missing, ` +
        `${summary.cachedButNotLogged} on disk but not logged).\n` +
        "Would you like to:\n" +
        "(Y) Re-download only logged items whose files are missing\n" +
        "(N) Skip logged items and process only new ones\n" +
        "(A) Process every extracted item\n" +
        "(E) Exit\n" +
        "Enter choice (Y/N/A/E): ",
    );

    switch (answer) {
      case "y":
        return "REDOWNLOAD_LOGGED_MISSING";
      case "n":
        return "SKIP_LOGGED_PROCESS_NEW";
      case "a":
        return "PROCESS_ALL";
      case "e":
        return "EXIT";
      default:
        console.log(
          JSON.stringify({
            scope: "decisions",
            action: "invalid_policy_answer",
            answer,
            fallback: "SKIP_LOGGED_PROCESS_NEW",
          }),
        );
        return "SKIP_LOGGED_PROCESS_NEW";
    }
  }

  async confirmReuse(item: ConflictItem): Promise<ReuseChoice> {
    const answer = await this.ask(
      `A file for this item already exists: ${item.assetPath}\n` +
        "Do you want to use the existing file? (Y/N/A for Apply 'Y' to All): ",
    );
    if (answer === "a") return "use_all";
    if (answer === "n") return "redownload";
    return "use";
  }

  async confirmReinfer(
    item: ConflictItem,
    mode: RunMode,
  ): Promise<ReinferChoice> {
    const processed = item.loggedLabels.join(" and ");
    const question =
      mode === "batch"
        ? "Do you want to run inference again? (Y/N/A for Apply 'N' to All): "
        : "Do you want to run inference again? (Y/N): ";
    const answer = await this.ask(
      `This item has already been processed for ${processed}.\n${question}`,
    );
    if (answer === "a" && mode === "batch") return "skip_all";
    if (answer === "n") return "skip";
    return "run";
  }

  async confirmRedownload(item: ConflictItem): Promise<boolean> {
    const answer = await this.ask(
      `This item has already been processed for ${item.loggedLabels.join(" and ")}, ` +
        "but the audio file is missing.\nDo you want to re-download it? (Y/N): ",
    );
    return answer === "y";
  }

  async confirmRetry(entries: RetryEntry[]): Promise<boolean> {
    const answer = await this.ask(
      `Retry ${entries.length} failed item(s)? (Y/N): `,
    );
    return answer === "y";
  }

  close(): void {
    this.rl?.close();
    this.rl = null;
  }

  private async ask(question: string): Promise<string> {
    if (!this.rl) {
      this.rl = createInterface({
        input: this.streams.input,
        output: this.streams.output,
      });
    }
    const answer = await this.rl.question(question);
    return answer.trim().toLowerCase();
  }
}

export interface PolicyDecisionOptions {
  policy: Exclude<BatchPolicy, "EXIT">;
  retryFailures?: boolean;
}

/**
 * Deterministic answers for unattended runs.
 *
 * PROCESS_ALL re-runs everything it is asked about; the other policies keep
 * existing work and never re-infer an already logged item.
 */
export class PolicyDecisionProvider implements DecisionProvider {
  constructor(private options: PolicyDecisionOptions) {}

  async confirmReinferAll(): Promise<boolean> {
    return this.options.policy === "PROCESS_ALL";
  }

  async chooseBatchPolicy(): Promise<BatchPolicy> {
    return this.options.policy;
  }

  async confirmReuse(): Promise<ReuseChoice> {
    return "use_all";
  }

  async confirmReinfer(): Promise<ReinferChoice> {
    return this.options.policy === "PROCESS_ALL" ? "run" : "skip";
  }

  async confirmRedownload(): Promise<boolean> {
    return this.options.policy !== "SKIP_LOGGED_PROCESS_NEW";
  }

  async confirmRetry(): Promise<boolean> {
    return this.options.retryFailures ?? false;
  }
}
