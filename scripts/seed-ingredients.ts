#!/usr/bin/env tsx
/**
 * Ingredient Catalog Seed Script
 *
 * Upserts the canonical ingredients from data/ingredients.json into
 * Supabase, matching on name. Safe to run repeatedly.
 *
 * Usage: npm run seed:ingredients
 */

import * as path from 'path';
import { createClient } from '@supabase/supabase-js';
import { config } from 'dotenv';
import { loadIngredientSeedRows } from '@/src/lib/catalog/catalogSeed';

config({ path: path.join(process.cwd(), '.env.local') });

const supabaseUrl = process.env.NEXT_PUBLIC_SUPABASE_URL;
const supabaseServiceKey = process.env.SUPABASE_SERVICE_ROLE_KEY;

if (!supabaseUrl || !supabaseServiceKey) {
  console.error('Missing environment variables:');
  console.error(
    '   NEXT_PUBLIC_SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required',
  );
  process.exit(1);
}

const supabase = createClient(supabaseUrl, supabaseServiceKey, {
  auth: { persistSession: false, autoRefreshToken: false },
});

async function seedIngredients(): Promise<number> {
  const rows = loadIngredientSeedRows();

  const { data, error } = await supabase
    .from('ingredients')
    .upsert(rows, { onConflict: 'name' })
    .select('name');

  if (error) {
    throw new Error(`Upsert failed: ${error.message}`);
  }

  for (const row of data ?? []) {
    console.log(`  upserted ${row.name}`);
  }
  return rows.length;
}

seedIngredients()
  .then((count) => {
    console.log(`\nSeeded ${count} ingredients.`);
    process.exit(0);
  })
  .catch((error: unknown) => {
    console.error('\nSeeding failed:', error);
    process.exit(1);
  });
