import { describeSyncError, type SyncProvider } from "@plainboard/sync";

/**
 * One background sync. An error status gets a configuration re-check first;
 * conflicts wait for an explicit sync_run.
 */
export async function runSyncCycle(sync: SyncProvider): Promise<void> {
  if (sync.status.kind === "error") {
    await sync.checkConfiguration();
  }

  const result = await sync.sync();
  if (!result.ok && result.error.kind !== "notConfigured" && result.error.kind !== "conflictDetected") {
    console.error(`[sync] Background sync failed: ${describeSyncError(result.error)}`);
  }
}

/**
 * Run runSyncCycle every `intervalMs`. Returns a stop function; an interval
 * of 0 schedules nothing.
 */
export function startPeriodicSync(sync: SyncProvider, intervalMs: number): () => void {
  if (intervalMs <= 0) {
    return () => {};
  }

  const timer = setInterval(() => {
    runSyncCycle(sync).catch((error: unknown) => {
      console.error("[sync] Background sync crashed:", error);
    });
  }, intervalMs);
  timer.unref();

  return () => clearInterval(timer);
}
