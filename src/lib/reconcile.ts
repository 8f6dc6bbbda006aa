/**
 * Batch reconciliation between requested identifiers, the ledger and the
 * local asset cache.
 *
 * One policy decision is taken for the whole batch (never per identifier);
 * every identifier then gets exactly one disposition from the table in
 * dispositionFor(). Snapshots are taken before the run and are not
 * refreshed by ledger appends made during it.
 */

import { DecisionProvider } from "./decisions";
import { LedgerSnapshot } from "./ledger";
import { AssetSnapshot } from "./asset-index";
import {
  BatchPolicy,
  Disposition,
  MediaReference,
  ReconciledItem,
  ReconciliationOutcome,
  ReconciliationSummary,
  RunMode,
} from "../types/pipeline";

export function summarize(
  refs: MediaReference[],
  ledger: LedgerSnapshot,
  assets: AssetSnapshot,
): ReconciliationSummary {
  let logged = 0;
  let cached = 0;
  let loggedButMissing = 0;
  let cachedButNotLogged = 0;

  for (const { identifier } of refs) {
    const isLogged = ledger.isLogged(identifier);
    const isCached = assets.has(identifier);
    if (isLogged) logged++;
    if (isCached) cached++;
    if (isLogged && !isCached) loggedButMissing++;
    if (isCached && !isLogged) cachedButNotLogged++;
  }

  return {
    total: refs.length,
    logged,
    cached,
    loggedButMissing,
    cachedButNotLogged,
    // Counts every unlogged identifier, cached or not: all of them are
    // processed under every policy.
    toProcess: Math.max(refs.length - logged, 0),
  };
}

/**
 * Disposition table. "Not logged" always means the item is processed.
 */
export function dispositionFor(
  logged: boolean,
  cached: boolean,
  policy: BatchPolicy | null,
): Disposition {
  if (!logged) {
    return cached ? "REUSE_EXISTING" : "DOWNLOAD_NEW";
  }

  switch (policy) {
    case "PROCESS_ALL":
      return cached ? "REINFER_EXISTING" : "REDOWNLOAD_MISSING";
    case "SKIP_LOGGED_PROCESS_NEW":
      return "SKIP";
    case "REDOWNLOAD_LOGGED_MISSING":
      return cached ? "SKIP" : "REDOWNLOAD_MISSING";
    case "EXIT":
      // The run stops before dispositions are used
      return "SKIP";
    case null:
      return cached ? "REUSE_EXISTING" : "REDOWNLOAD_MISSING";
  }
}

type PolicyDecision =
  | { kind: "proceed"; policy: BatchPolicy | null; fullRerun: boolean }
  | { kind: "exit"; reason: string };

export async function decideBatchPolicy(
  summary: ReconciliationSummary,
  mode: RunMode,
  decisions: DecisionProvider,
): Promise<PolicyDecision> {
  if (mode === "single") {
    return { kind: "proceed", policy: null, fullRerun: false };
  }

  const { total, logged, cached, loggedButMissing, cachedButNotLogged, toProcess } =
    summary;

  if (total > 0 && logged === total && cached === total) {
    const rerun = await decisions.confirmReinferAll(summary);
    return rerun
      ? { kind: "proceed", policy: "PROCESS_ALL", fullRerun: true }
      : { kind: "exit", reason: "batch_already_processed" };
  }

  const inconsistent =
    loggedButMissing > 0 || cachedButNotLogged > 0 || toProcess !== total;

  if (logged > 0 && inconsistent) {
    const policy = await decisions.chooseBatchPolicy(summary);

    if (policy === "EXIT") {
      return { kind: "exit", reason: "user_exit" };
    }
    if (policy === "REDOWNLOAD_LOGGED_MISSING" && loggedButMissing === 0) {
      return { kind: "exit", reason: "nothing_logged_missing" };
    }
    if (policy === "SKIP_LOGGED_PROCESS_NEW" && toProcess === 0) {
      return { kind: "exit", reason: "nothing_new" };
    }
    return { kind: "proceed", policy, fullRerun: false };
  }

  return { kind: "proceed", policy: null, fullRerun: false };
}

export async function reconcile(
  refs: MediaReference[],
  ledger: LedgerSnapshot,
  assets: AssetSnapshot,
  mode: RunMode,
  decisions: DecisionProvider,
): Promise<ReconciliationOutcome> {
  const summary = summarize(refs, ledger, assets);

  console.log(
    JSON.stringify({
      scope: "reconcile",
      action: "summary",
      mode,
      total: summary.total,
      logged: summary.logged,
      cached: summary.cached,
      logged_but_missing: summary.loggedButMissing,
      cached_but_not_logged: summary.cachedButNotLogged,
      to_process: summary.toProcess,
    }),
  );

  const decision = await decideBatchPolicy(summary, mode, decisions);
  if (decision.kind === "exit") {
    console.log(
      JSON.stringify({
        scope: "reconcile",
        action: "exit",
        reason: decision.reason,
      }),
    );
    return { kind: "exit", reason: decision.reason, summary };
  }

  const items: ReconciledItem[] = refs.map((ref) => {
    const logged = ledger.isLogged(ref.identifier);
    const asset = assets.get(ref.identifier);
    return {
      ref,
      disposition: dispositionFor(logged, asset !== null, decision.policy),
      logged,
      loggedClasses: ledger.loggedClasses(ref.identifier),
      asset,
    };
  });

  const counts: Partial<Record<Disposition, number>> = {};
  for (const item of items) {
    counts[item.disposition] = (counts[item.disposition] ?? 0) + 1;
  }

  console.log(
    JSON.stringify({
      scope: "reconcile",
      action: "dispositions",
      policy: decision.policy,
      full_rerun: decision.fullRerun,
      counts,
    }),
  );

  return {
    kind: "proceed",
    policy: decision.policy,
    fullRerun: decision.fullRerun,
    summary,
    items,
  };
}
