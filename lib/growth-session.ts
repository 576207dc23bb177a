import type { GrowthEvent, GrowthUpdate, ReferenceCurveSet } from '@/types/growth';
import { AzureBlobStore, type BlobStore } from './blob-store';
import { loadConfig, type AppConfig } from './config';
import { GrowthRecordStore, type LoadOutcome } from './growth-records';
import { logger } from './logger';
import { loadReferenceCurves } from './reference-curves';
import { handleGrowthEvent } from './update-engine';

/**
 * The tracker's state: one record store and the reference curves it is
 * charted against. Events are applied one at a time in arrival order.
 */
export class GrowthSession {
  // Tail of the event queue
  private queue: Promise<void> = Promise.resolve();

  constructor(
    readonly store: GrowthRecordStore,
    readonly curves: ReferenceCurveSet,
    readonly loadOutcome: LoadOutcome
  ) {}

  /**
   * Execute a function with exclusive access to the record store.
   * Prevents concurrent read-modify-write races between requests.
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    const pending = this.queue;
    let release: () => void = () => {};
    this.queue = new Promise<void>((resolve) => {
      release = resolve;
    });

    try {
      await pending;
      return await fn();
    } finally {
      release();
    }
  }

  dispatch(event: GrowthEvent): Promise<GrowthUpdate> {
    return this.withLock(() => {
      logger.debug('session', 'Handling event', { event: event.type });
      return handleGrowthEvent(this.store, this.curves, event);
    });
  }
}

/**
 * Loads the reference curves (fatal when they cannot be read) and the growth
 * records (empty when they cannot be read).
 */
export async function openGrowthSession(config: AppConfig, blobStore: BlobStore): Promise<GrowthSession> {
  const curves = await loadReferenceCurves(blobStore, config.referenceBlob);
  const store = new GrowthRecordStore(blobStore, config.recordsBlob);
  const loadOutcome = await store.load();

  logger.info('session', 'Growth session opened', { container: config.storage.containerName }, {
    records: store.size,
    loadOutcome,
  });
  return new GrowthSession(store, curves, loadOutcome);
}

let sessionPromise: Promise<GrowthSession> | null = null;

/**
 * The process-wide session, opened from the environment on first use.
 * A failed open is kept: configuration and reference data errors are fatal.
 */
export function getGrowthSession(): Promise<GrowthSession> {
  if (!sessionPromise) {
    sessionPromise = (async () => {
      const config = loadConfig();
      const blobStore = AzureBlobStore.fromConnectionString(
        config.storage.connectionString,
        config.storage.containerName
      );
      return openGrowthSession(config, blobStore);
    })();
  }
  return sessionPromise;
}
