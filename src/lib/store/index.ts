/**
 * Store selection for server code
 *
 * BOWL_STORE_DRIVER=memory keeps everything in this server process, seeded
 * with the canonical catalog.
 */

import 'server-only';
import { loadCanonicalCatalog } from '@/src/lib/catalog/catalogSeed';
import { getServerEnv } from '@/src/lib/config/env';
import { createAdminClient } from '@/src/lib/supabase/admin';
import { MemoryBowlBuilderStore } from './memoryStore';
import type { BowlBuilderStore } from './store.types';
import { SupabaseBowlBuilderStore } from './supabaseStore';

declare global {
  // Survives dev-server module reloads, which would otherwise wipe the data
  var bowlMemoryStore: MemoryBowlBuilderStore | undefined;
}

export function getStore(): BowlBuilderStore {
  if (getServerEnv().BOWL_STORE_DRIVER === 'memory') {
    globalThis.bowlMemoryStore ??= new MemoryBowlBuilderStore(
      loadCanonicalCatalog(),
    );
    return globalThis.bowlMemoryStore;
  }
  return new SupabaseBowlBuilderStore(createAdminClient());
}
