import type { RecordStorePort } from '@fleet-ledger/domain';
import { getPool, InMemoryRecordStore, loadRecordSnapshot, PgRecordStore } from '@fleet-ledger/adapters';
import type { AppConfig } from '../config/app-config.js';

export type StoreKind = 'postgres' | 'snapshot' | 'memory';

export interface ConfiguredStore {
  store: RecordStorePort;
  kind: StoreKind;
}

export async function createRecordStore(
  config: Pick<AppConfig, 'databaseUrl' | 'snapshotPath'>,
): Promise<ConfiguredStore> {
  if (config.databaseUrl) {
    const pool = getPool(config.databaseUrl);
    await pool.query('SELECT 1');
    console.log('[server] database connected');
    return { store: new PgRecordStore(pool), kind: 'postgres' };
  }

  if (config.snapshotPath) {
    const store = await loadRecordSnapshot(config.snapshotPath);
    const size = store.size();
    console.log(
      `[server] loaded snapshot ${config.snapshotPath}: ${size.movements} movements, ` +
        `${size.fuelRecords} fuel records, ${size.drivers} drivers, ${size.vehicles} vehicles`,
    );
    return { store, kind: 'snapshot' };
  }

  console.warn('[server] neither DATABASE_URL nor FLEET_SNAPSHOT_PATH set; serving an empty in-memory store');
  return { store: new InMemoryRecordStore(), kind: 'memory' };
}
