/**
 * Acquisition coordinator: turns a reconciled item into a local asset path,
 * resolving ledger/cache conflicts through the run's DecisionProvider.
 *
 * A null result means "skip this identifier" and is not an error.
 */

import { AssetIndex, AssetSnapshot, titleFromAssetPath } from "./asset-index";
import { ConflictItem, DecisionProvider } from "./decisions";
import { FetchError, errorMessage } from "./errors";
import { eventClassLabel } from "./event-classes";
import { Fetcher } from "./fetcher";
import { LedgerSnapshot } from "./ledger";
import { RunContext } from "./run-context";
import { AcquiredAsset, AssetRecord, ReconciledItem } from "../types/pipeline";

export interface AcquisitionDeps {
  fetcher: Fetcher;
  assets: AssetIndex;
  decisions: DecisionProvider;
  ledger: LedgerSnapshot;
  // Batch-start asset scan; kept in step with files deleted or downloaded
  snapshot: AssetSnapshot;
}

export class AcquisitionCoordinator {
  constructor(private deps: AcquisitionDeps) {}

  async acquire(
    item: ReconciledItem,
    ctx: RunContext,
  ): Promise<AcquiredAsset | null> {
    switch (item.disposition) {
      case "SKIP":
        return null;

      case "REINFER_EXISTING":
        if (item.asset) {
          return this.useExisting(item.asset, ctx);
        }
        return this.fetch(item, ctx);

      case "REUSE_EXISTING":
        if (item.asset) {
          return this.reuse(item, item.asset, ctx);
        }
        return this.fetch(item, ctx);

      case "REDOWNLOAD_MISSING":
        // A batch policy already decided this; only ask when there was none
        if (ctx.policy === null) {
          const confirmed = await this.deps.decisions.confirmRedownload(
            this.conflict(item),
          );
          if (!confirmed) {
            this.logSkip(item, "redownload_declined");
            return null;
          }
        }
        return this.fetch(item, ctx);

      case "DOWNLOAD_NEW":
        return this.fetch(item, ctx);
    }
  }

  private async reuse(
    item: ReconciledItem,
    asset: AssetRecord,
    ctx: RunContext,
  ): Promise<AcquiredAsset | null> {
    if (!item.logged) {
      if (ctx.useExistingAll) {
        return this.useExisting(asset, ctx);
      }

      const choice = await this.deps.decisions.confirmReuse(this.conflict(item));
      if (choice === "use_all") {
        ctx.useExistingAll = true;
      }
      if (choice === "redownload") {
        await this.deps.assets.remove(asset);
        this.deps.snapshot.delete(asset.identifier);
        item.asset = null;
        return this.fetch(item, ctx);
      }
      return this.useExisting(asset, ctx);
    }

    if (ctx.skipAll) {
      this.logSkip(item, "skip_all");
      return null;
    }

    if (!ctx.fullRerun) {
      const choice = await this.deps.decisions.confirmReinfer(
        this.conflict(item),
        ctx.mode,
      );
      if (choice === "skip_all") {
        ctx.skipAll = true;
        this.logSkip(item, "skip_all_selected");
        return null;
      }
      if (choice === "skip") {
        this.logSkip(item, "reinfer_declined");
        return null;
      }
    }

    return this.useExisting(asset, ctx);
  }

  private useExisting(asset: AssetRecord, ctx: RunContext): AcquiredAsset {
    ctx.counters.existingFilesUsed++;
    const title =
      this.deps.ledger.latestTitle(asset.identifier) ??
      titleFromAssetPath(asset.localPath);

    console.log(
      JSON.stringify({
        scope: "acquisition",
        action: "existing_asset_used",
        identifier: asset.identifier,
        path: asset.localPath,
      }),
    );

    return { path: asset.localPath, title };
  }

  private async fetch(
    item: ReconciledItem,
    ctx: RunContext,
  ): Promise<AcquiredAsset | null> {
    const { reference, identifier } = item.ref;
    try {
      const metadata = await this.deps.fetcher.resolveMetadata(
        reference,
        ctx.cookies,
      );

      // Hosts without a recognized id pattern are cached under the
      // downloader's own id, so look for that file before downloading
      if (metadata.identifier !== identifier) {
        const cached = await this.deps.assets.find(metadata.identifier);
        if (cached) {
          ctx.counters.existingFilesUsed++;
          this.deps.snapshot.set({ identifier, localPath: cached.localPath });
          console.log(
            JSON.stringify({
              scope: "acquisition",
              action: "existing_asset_used",
              identifier,
              media_id: metadata.identifier,
              path: cached.localPath,
            }),
          );
          return { path: cached.localPath, title: metadata.title };
        }
      }

      const path = await this.deps.fetcher.download(reference, ctx.cookies);
      ctx.counters.newDownloads++;
      this.deps.snapshot.set({ identifier, localPath: path });

      console.log(
        JSON.stringify({
          scope: "acquisition",
          action: "downloaded",
          identifier,
          path,
          title: metadata.title,
        }),
      );

      return { path, title: metadata.title };
    } catch (error) {
      const fetchError =
        error instanceof FetchError
          ? error
          : new FetchError(errorMessage(error), reference, error);

      ctx.counters.failed++;
      ctx.retryList.push({
        reference,
        identifier,
        error_type: "fetch",
        message: fetchError.message,
      });

      console.error(
        JSON.stringify({
          scope: "acquisition",
          status: "error",
          error_type: "fetch",
          identifier,
          reference,
          mode: ctx.mode,
          message: fetchError.message,
        }),
      );

      if (ctx.mode === "single") {
        throw fetchError;
      }
      return null;
    }
  }

  private conflict(item: ReconciledItem): ConflictItem {
    return {
      identifier: item.ref.identifier,
      reference: item.ref.reference,
      assetPath: item.asset?.localPath ?? null,
      loggedLabels: item.loggedClasses.map(eventClassLabel),
    };
  }

  private logSkip(item: ReconciledItem, reason: string): void {
    console.log(
      JSON.stringify({
        scope: "acquisition",
        action: "skipped",
        identifier: item.ref.identifier,
        reason,
      }),
    );
  }
}
