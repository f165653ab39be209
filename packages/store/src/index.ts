/**
 * Sorted key-value store stand-in for tuple keys.
 *
 * Provides an in-memory ordered store and a transaction coordinator that
 * completes versionstamped keys and values at commit.
 *
 * Usage:
 *   import { InMemoryKVStore, TransactionCoordinator, VersionClock, loadConfig } from '@tuplekey/store';
 *   import { Elem, Subspace, incompleteVersionstamp } from '@tuplekey/tuple';
 *
 *   const store = new InMemoryKVStore();
 *   const tx = new TransactionCoordinator(store, new VersionClock(loadConfig()));
 *   const log = new Subspace([Elem.text('log')]);
 *
 *   tx.begin();
 *   tx.setVersionstampedKey(log.packWithVersionstamp([Elem.versionstamp(incompleteVersionstamp())]), value);
 *   await tx.commit();
 */

export * from './common/index.js';
export * from './config/index.js';
